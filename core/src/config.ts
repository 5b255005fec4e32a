import { createValidationError, ValidationErrorCode } from './errors/index.js';

/**
 * Validated, read-only configuration for one run.
 */
export interface EngineConfig {
  /** Silence threshold in dB; always negative */
  readonly threshold: number;
  /** Minimum silence duration reported by the detector, in seconds */
  readonly minSilenceDuration: number;
  /** Padding kept attached to speech on both sides, in seconds */
  readonly padding: number;
  /** Playback speed for silence; absent means silence is removed */
  readonly accelerationFactor?: number;
  /** Insert ramps around accelerated silence and flag blend-eligible segments */
  readonly fluidTransitions: boolean;
}

/**
 * Raw configuration values before validation. Omitted values take defaults.
 */
export interface EngineConfigInput {
  threshold?: number;
  minSilenceDuration?: number;
  padding?: number;
  accelerationFactor?: number;
  fluidTransitions?: boolean;
}

export const ENGINE_CONFIG_DEFAULTS = {
  threshold: -40,
  minSilenceDuration: 0.5,
  padding: 0.1,
  fluidTransitions: false,
} as const;

/**
 * Validates raw values and returns a frozen {@link EngineConfig}.
 *
 * Runs before any external tool is invoked so bad input fails fast.
 */
export function createEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const threshold = input.threshold ?? ENGINE_CONFIG_DEFAULTS.threshold;
  const minSilenceDuration = input.minSilenceDuration ?? ENGINE_CONFIG_DEFAULTS.minSilenceDuration;
  const padding = input.padding ?? ENGINE_CONFIG_DEFAULTS.padding;
  const fluidTransitions = input.fluidTransitions ?? ENGINE_CONFIG_DEFAULTS.fluidTransitions;
  const { accelerationFactor } = input;

  if (!Number.isFinite(threshold) || threshold >= 0) {
    throw createValidationError(
      ValidationErrorCode.INVALID_THRESHOLD,
      `Silence threshold must be negative (dB), got ${threshold}.`,
      { suggestion: 'Use a value such as -40 or -30.' },
    );
  }

  if (!Number.isFinite(minSilenceDuration) || minSilenceDuration <= 0) {
    throw createValidationError(
      ValidationErrorCode.INVALID_MIN_SILENCE_DURATION,
      `Minimum silence duration must be greater than 0 seconds, got ${minSilenceDuration}.`,
    );
  }

  assertValidPadding(padding);

  if (accelerationFactor !== undefined && (!Number.isFinite(accelerationFactor) || accelerationFactor <= 1)) {
    throw createValidationError(
      ValidationErrorCode.INVALID_ACCELERATION_FACTOR,
      `Acceleration factor must be greater than 1.0, got ${accelerationFactor}.`,
      { suggestion: 'Omit the acceleration factor to remove silence instead.' },
    );
  }

  const config: EngineConfig =
    accelerationFactor === undefined
      ? { threshold, minSilenceDuration, padding, fluidTransitions }
      : { threshold, minSilenceDuration, padding, accelerationFactor, fluidTransitions };

  return Object.freeze(config);
}

export function assertValidPadding(padding: number): void {
  if (!Number.isFinite(padding) || padding < 0) {
    throw createValidationError(
      ValidationErrorCode.INVALID_PADDING,
      `Padding must be zero or a positive number of seconds, got ${padding}.`,
    );
  }
}

export function isAccelerationMode(config: EngineConfig): boolean {
  return config.accelerationFactor !== undefined;
}

export * from './timeline/index.js';
export * from './errors/index.js';
export { createEngineConfig, assertValidPadding, isAccelerationMode, ENGINE_CONFIG_DEFAULTS } from './config.js';
export type { EngineConfig, EngineConfigInput } from './config.js';
export type { DetectorSelection, DetectorKind, DetectOptions, SilenceDetector } from './detection.js';
export { noopLogger, isLevelEnabled } from './logger.js';
export type { Logger, LogLevel, LogMeta } from './logger.js';
export { loadEnv, findWorkspaceRoot, resolveToolPaths } from './env-loader.js';
export type { EnvLoaderOptions, EnvLoaderResult, ToolPaths } from './env-loader.js';
export { formatTime } from './time-format.js';

/**
 * Formats seconds as `HH:MM:SS.mmm`.
 *
 * @example
 * formatTime(3725.5) // "01:02:05.500"
 */
export function formatTime(seconds: number): string {
  const totalMillis = Math.max(0, Math.round(seconds * 1000));
  const hours = Math.floor(totalMillis / 3_600_000);
  const minutes = Math.floor((totalMillis % 3_600_000) / 60_000);
  const secondsPart = (totalMillis % 60_000) / 1000;

  return `${pad2(hours)}:${pad2(minutes)}:${secondsPart.toFixed(3).padStart(6, '0')}`;
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

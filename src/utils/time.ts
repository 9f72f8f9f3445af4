/**
 * Format seconds as MM:SS. Fractional seconds are truncated; minutes are
 * not wrapped into hours.
 */
export function formatClock(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);

  return `${minutes.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
}

export function formatTimeRange(startSec: number, endSec: number): string {
  return `${formatClock(startSec)}-${formatClock(endSec)}`;
}

export function isTimeInSegment(time: number, start: number, end: number): boolean {
  return start <= time && time <= end;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

const MS_PER_HOUR = 3_600_000;
const MS_PER_MINUTE = 60_000;
const MS_PER_SECOND = 1_000;

const pad = (value: number, width: number): string =>
  value.toString().padStart(width, "0");

/**
 * Formats seconds as an SRT timecode `HH:MM:SS,mmm`.
 *
 * Seconds are converted to whole milliseconds with `Math.round`, so a half
 * millisecond rounds up. Hours keep growing past 99 instead of wrapping.
 */
export function formatTimestamp(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new RangeError(
      `Expected a non-negative number of seconds, received ${seconds}`
    );
  }

  let milliseconds = Math.round(seconds * 1000);
  const hours = Math.floor(milliseconds / MS_PER_HOUR);
  milliseconds -= hours * MS_PER_HOUR;
  const minutes = Math.floor(milliseconds / MS_PER_MINUTE);
  milliseconds -= minutes * MS_PER_MINUTE;
  const secs = Math.floor(milliseconds / MS_PER_SECOND);
  milliseconds -= secs * MS_PER_SECOND;

  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(secs, 2)},${pad(
    milliseconds,
    3
  )}`;
}

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

/**
 * Renders a duration as `[-][d.]hh:mm:ss[.fff]`. Milliseconds appear only
 * when the duration is not a whole number of seconds.
 *
 * @example
 * ```typescript
 * formatTimeSpan(600_000);  // "00:10:00"
 * formatTimeSpan(1_500);    // "00:00:01.500"
 * formatTimeSpan(90_061_000); // "1.01:01:01"
 * ```
 */
export function formatTimeSpan(ms: number): string {
  const sign = ms < 0 ? "-" : "";
  let rest = Math.round(Math.abs(ms));

  const days = Math.floor(rest / MS_PER_DAY);
  rest %= MS_PER_DAY;
  const hours = Math.floor(rest / MS_PER_HOUR);
  rest %= MS_PER_HOUR;
  const minutes = Math.floor(rest / MS_PER_MINUTE);
  rest %= MS_PER_MINUTE;
  const seconds = Math.floor(rest / MS_PER_SECOND);
  const millis = rest % MS_PER_SECOND;

  const dayPart = days > 0 ? `${days}.` : "";
  const fraction = millis > 0 ? `.${pad(millis, 3)}` : "";
  return `${sign}${dayPart}${pad(hours)}:${pad(minutes)}:${pad(seconds)}${fraction}`;
}

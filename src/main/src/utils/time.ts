export const SECOND = 1000;
export const MINUTE = 60 * SECOND;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

const pad = (value: number) => (value + '').padStart(2, '0');

/** `yyyy-MM-dd HH:mm` in local time. */
export function formatNoteTimestamp(milliseconds: number) {
  const date = new Date(milliseconds);
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(
    date.getMinutes(),
  )}`;
}

/** The usage period a moment belongs to, `yyyy-MM`. */
export function monthPeriod(milliseconds: number) {
  const date = new Date(milliseconds);
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}`;
}

/** Whole days left until `until`, rounded up; never negative. */
export function daysRemaining(now: number, until: number) {
  if (until <= now) {
    return 0;
  }
  return Math.ceil((until - now) / DAY);
}

export const sleep = (milliseconds: number) =>
  new Promise<void>((resolve) => {
    if (milliseconds <= 0) {
      resolve();
      return;
    }
    setTimeout(resolve, milliseconds);
  });

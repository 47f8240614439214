const pad = (n: number, width = 2) => String(n).padStart(width, "0");

/** Local time as `YYYY-MM-DD HH:mm:ss`, or with `.SSS` when `withMillis` is set. */
export function formatDateTime(date: Date, withMillis = false): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  const base = `${day} ${time}`;
  return withMillis ? `${base}.${pad(date.getMilliseconds(), 3)}` : base;
}

const pad = (value: number, width = 2) => value.toString().padStart(width, "0");

/** Local date, e.g. `2025-01-24`. */
export function formatDateFolder(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local date and time down to milliseconds, e.g. `2025-01-24-23-04-01-123`. */
export function formatFileStamp(date: Date): string {
  return [
    formatDateFolder(date),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
    pad(date.getMilliseconds(), 3),
  ].join("-");
}

/** Microseconds as `<ms>.<remaining µs>` the way mkvmerge timecode v2 files expect. */
export function formatTimecode(timestampUs: number): string {
  const sign = timestampUs < 0 ? "-" : "";
  const abs = Math.abs(timestampUs);
  return `${sign}${Math.trunc(abs / 1000)}.${pad(abs % 1000, 3)}`;
}

const pad = (value: number, length = 2): string =>
  String(value).padStart(length, '0');

/**
 * Local-time timestamp used in output file names, e.g. `20240105090307`.
 */
export function formatCompactTimestamp(date: Date): string {
  return (
    pad(date.getFullYear(), 4) +
    pad(date.getMonth() + 1) +
    pad(date.getDate()) +
    pad(date.getHours()) +
    pad(date.getMinutes()) +
    pad(date.getSeconds())
  );
}

/**
 * Local-time timestamp used in log records, e.g. `2024-01-05 09:03:07`.
 */
export function formatLogTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

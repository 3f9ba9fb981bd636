export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local wall-clock time, `YYYY-MM-DD HH:mm:ss.SSS`.
 */
export function formatTimestamp(at: Date = new Date()): string {
  const date = `${String(at.getFullYear())}-${pad(at.getMonth() + 1)}-${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}:${pad(at.getMinutes())}:${pad(at.getSeconds())}.${pad(at.getMilliseconds(), 3)}`;
  return `${date} ${time}`;
}

/**
 * One JSON object per line on stdout: `timestamp`, `level` and `event` first, then the fields.
 */
export function logJsonl(level: LogLevel, event: string, fields: Record<string, unknown> = {}): void {
  console.log(
    JSON.stringify({
      timestamp: formatTimestamp(),
      level,
      event,
      ...fields,
    }),
  );
}

export function log(level: LogLevel, message: string): void {
  console.log(`[${formatTimestamp()}] ${level} - ${message}`);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Log fields for a thrown value. Node system errors keep their `code`.
 */
export function errorFields(error: unknown): Record<string, unknown> {
  const fields: Record<string, unknown> = { error: getErrorMessage(error) };

  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    fields.code = error.code;
  }

  return fields;
}

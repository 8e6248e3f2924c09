const pad = (n: number, w = 2) => String(n).padStart(w, '0');

/**
 * Convert seconds to HH:MM:SS (whole seconds, floored).
 * Hours are not wrapped, so 90000s prints 25:00:00.
 */
export function toTimestamp(sec: number): string {
  const total = Math.max(0, Math.floor(sec + 1e-6));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return `${pad(h)}:${pad(m)}:${pad(s)}`;
}

/**
 * Parse `HH:MM:SS(.ms)` or `MM:SS` or plain seconds into seconds.
 * Returns null for anything else.
 */
export function parseTimestamp(text: string): number | null {
  const trimmed = text.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) return Number(trimmed);
  const m = trimmed.match(/^(?:(\d+):)?(\d{1,2}):(\d{1,2}(?:\.\d+)?)$/);
  if (!m) return null;
  const hours = m[1] ? Number(m[1]) : 0;
  const minutes = Number(m[2]);
  const seconds = Number(m[3]);
  if (minutes >= 60 || seconds >= 60) return null;
  return hours * 3600 + minutes * 60 + seconds;
}

/** Fixed-precision number for encoder arguments (trailing zeros trimmed) */
export function f(num: number): string {
  return Number(num.toFixed(6)).toString();
}

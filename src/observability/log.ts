import { maskText } from '../security/log_mask.js';

export type Level = 'debug' | 'info' | 'warn' | 'error';

const ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const isLevel = (v: string): v is Level => Object.prototype.hasOwnProperty.call(ORDER, v);

function threshold(): number {
  const v = String(process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLevel(v) ? ORDER[v] : ORDER.info;
}

export function errMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e ?? 'error');
}

// One JSON object per line, keyed by event name in `at`
export function logEvent(level: Level, at: string, fields: Record<string, unknown> = {}) {
  if (ORDER[level] < threshold()) return;
  let line: string;
  try {
    line = JSON.stringify({ ts: new Date().toISOString(), level, at, ...fields });
  } catch {
    line = JSON.stringify({ ts: new Date().toISOString(), level, at, note: 'unserializable fields' });
  }
  line = maskText(line) ?? line;
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

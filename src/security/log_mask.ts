export const mask = (s: string, keep = 4) => (s && s.length > keep * 2 ? s.slice(0, keep) + '…' + s.slice(-keep) : s);
export const maskChatId = (s?: string | null) => (s ? (s.startsWith('@') ? s : mask(s, 3)) : s);
export const maskText = (s?: string) => (s ? s.replace(/\b\d{6,}:[\w-]{20,}\b/g, (m) => mask(m, 4)) : s);

let enabled = process.env.PII_MASK !== 'false';
export function setMasking(on: boolean) { enabled = on; }
export const maybeMask = (s: string | null | undefined) => (enabled ? maskChatId(s) : s);

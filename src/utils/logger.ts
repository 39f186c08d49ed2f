import { CONFIG } from '../config.js';

type Meta = Record<string, unknown>;

function serialize(meta: Meta): Meta {
  const out: Meta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value instanceof Error) {
      const code = 'code' in value && typeof value.code === 'string' ? value.code : undefined;
      out[key] = { name: value.name, message: value.message, ...(code ? { code } : {}) };
    } else {
      out[key] = value;
    }
  }
  return out;
}

export function logInfo(message: string, meta: Meta = {}) {
  if (CONFIG.logLevel === 'error') return;
  const payload = { level: 'info', message, ...serialize(meta) };
  console.error(JSON.stringify(payload));
}

export function logError(message: string, meta: Meta = {}) {
  const payload = { level: 'error', message, ...serialize(meta) };
  console.error(JSON.stringify(payload));
}

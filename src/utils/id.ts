import { randomBytes } from 'crypto';

/** Short, sortable-ish identifier: `<prefix>_<base36 time>_<hex>`. */
export function generateId(prefix: string): string {
  const time = Date.now().toString(36);
  const rand = randomBytes(4).toString('hex');
  return `${prefix}_${time}_${rand}`;
}

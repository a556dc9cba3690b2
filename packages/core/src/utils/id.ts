import { randomUUID } from 'node:crypto';

/** Random 32-character hex id (a UUIDv4 without dashes). */
export function generateId(): string {
  return randomUUID().replace(/-/g, '');
}

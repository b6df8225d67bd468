// shared/utils.ts — ID generation, timestamp helpers

import { randomBytes } from 'node:crypto';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

function nanoid(size: number): string {
  let id = '';
  for (const byte of randomBytes(size)) {
    id += ALPHABET.charAt(byte % ALPHABET.length);
  }
  return id;
}

export function generateEffectId(): string {
  return `eff_${nanoid(10)}`;
}

export function generateLogId(): string {
  return `log_${nanoid(10)}`;
}

export function toISO(ms: number): string {
  return new Date(ms).toISOString();
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

import { InvalidArgumentError } from 'commander';
import type { CallResult } from '../scheduler/types.js';
import { isRecord } from '../providers/http.js';

export function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a whole number.');
  }
  return n;
}

export function parsePositiveCount(value: string): number {
  const n = parseCount(value);
  if (n === 0) throw new InvalidArgumentError('Expected at least 1.');
  return n;
}

export function parseSeconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive number of seconds.');
  }
  return Math.round(n * 1000);
}

/** Text of a prompt response, or its JSON when it is something else */
export function responseText(response: unknown): string {
  if (isRecord(response) && typeof response.text === 'string') return response.text;
  return JSON.stringify(response, null, 2);
}

/** The key that produced a successful result */
export function winningCredential(result: CallResult): string | undefined {
  return result.attempts.find(a => a.outcome === 'success')?.credentialId;
}

export function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length <= max ? flat : flat.slice(0, max - 1) + '…';
}

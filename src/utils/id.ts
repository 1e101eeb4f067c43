import { nanoid } from 'nanoid';

export function generateId(size = 12): string {
  return nanoid(size);
}

/** Request ids: `req_` plus 10 url-safe characters. */
export function generateRequestId(): string {
  return `req_${nanoid(10)}`;
}

import type { ProviderErrorKind } from '../errors.js';
import { errorMessage } from '../errors.js';
import type { ProviderOutcome } from './provider.js';
import { providerFailure } from './provider.js';

/** Payload understood by the built-in providers */
export interface PromptPayload {
  prompt: string;
  system?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface PromptResponse {
  text: string;
  model: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPromptPayload(value: unknown): value is PromptPayload {
  if (!isRecord(value)) return false;
  if (typeof value.prompt !== 'string' || value.prompt.trim() === '') return false;
  if (value.system !== undefined && typeof value.system !== 'string') return false;
  if (value.model !== undefined && typeof value.model !== 'string') return false;
  if (value.temperature !== undefined && typeof value.temperature !== 'number') return false;
  if (value.maxTokens !== undefined && typeof value.maxTokens !== 'number') return false;
  return true;
}

export function kindForStatus(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return 'auth_error';
  if (status === 429) return 'rate_limited';
  if (status === 400 || status === 404 || status === 422) return 'invalid_response';
  return 'transport_error';
}

function describeErrorBody(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  const error = body.error;
  if (typeof error === 'string') return error;
  if (isRecord(error) && typeof error.message === 'string') return error.message;
  return undefined;
}

/**
 * POST a JSON body and return the parsed JSON response, mapping HTTP and
 * network failures onto provider error kinds.
 */
export async function postJson(
  url: string,
  headers: Record<string, string>,
  body: unknown,
  signal: AbortSignal,
): Promise<ProviderOutcome<unknown>> {
  let res: Awaited<ReturnType<typeof fetch>>;
  try {
    res = await fetch(url, {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal,
    });
  } catch (err) {
    if (signal.aborted) return providerFailure('timeout', 'Request aborted at deadline');
    return providerFailure('transport_error', errorMessage(err));
  }

  let text: string;
  try {
    text = await res.text();
  } catch (err) {
    if (signal.aborted) return providerFailure('timeout', 'Response aborted at deadline');
    return providerFailure('transport_error', errorMessage(err));
  }

  let parsed: unknown;
  try {
    parsed = text === '' ? undefined : JSON.parse(text);
  } catch {
    parsed = undefined;
  }

  if (!res.ok) {
    const detail = describeErrorBody(parsed) ?? (text.slice(0, 200) || res.statusText);
    return providerFailure(kindForStatus(res.status), `HTTP ${res.status}: ${detail}`);
  }
  if (parsed === undefined) {
    return providerFailure('invalid_response', 'Response body is not JSON');
  }
  return { ok: true, response: parsed };
}

export function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

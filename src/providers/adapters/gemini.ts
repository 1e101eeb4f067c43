import type { Credential } from '../../pool/credential.js';
import type { CallContext, ProviderCall, ProviderOutcome } from '../provider.js';
import { providerFailure } from '../provider.js';
import type { PromptResponse } from '../http.js';
import { isPromptPayload, isRecord, postJson, trimSlash } from '../http.js';

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com';

export interface GeminiProviderOptions {
  model: string;
  baseUrl?: string;
}

function extractText(body: unknown): string | undefined {
  if (!isRecord(body) || !Array.isArray(body.candidates)) return undefined;
  const first: unknown = body.candidates[0];
  if (!isRecord(first) || !isRecord(first.content) || !Array.isArray(first.content.parts)) return undefined;

  const texts: string[] = [];
  for (const part of first.content.parts) {
    if (isRecord(part) && typeof part.text === 'string') texts.push(part.text);
  }
  return texts.length > 0 ? texts.join('') : undefined;
}

/** Generative Language API, `models/{model}:generateContent`. */
export class GeminiProvider implements ProviderCall<unknown, PromptResponse> {
  readonly id = 'gemini';
  private baseUrl: string;

  constructor(private options: GeminiProviderOptions) {
    this.baseUrl = trimSlash(options.baseUrl ?? GEMINI_BASE_URL);
  }

  async call(payload: unknown, credential: Credential, context: CallContext): Promise<ProviderOutcome<PromptResponse>> {
    if (!isPromptPayload(payload)) {
      return providerFailure('invalid_response', 'Payload must be an object with a non-empty prompt');
    }

    const model = payload.model ?? this.options.model;
    const body: Record<string, unknown> = {
      contents: [{ role: 'user', parts: [{ text: payload.prompt }] }],
      generationConfig: {
        ...(payload.temperature !== undefined ? { temperature: payload.temperature } : {}),
        ...(payload.maxTokens !== undefined ? { maxOutputTokens: payload.maxTokens } : {}),
      },
    };
    if (payload.system) {
      body.systemInstruction = { parts: [{ text: payload.system }] };
    }

    const url = `${this.baseUrl}/v1beta/models/${encodeURIComponent(model)}:generateContent`;
    const outcome = await postJson(url, { 'x-goog-api-key': credential.apiKey }, body, context.signal);
    if (!outcome.ok) return outcome;

    const text = extractText(outcome.response);
    if (text === undefined) {
      return providerFailure('invalid_response', 'Response has no candidate text');
    }
    return { ok: true, response: { text, model } };
  }
}

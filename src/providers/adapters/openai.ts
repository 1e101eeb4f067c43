import type { Credential } from '../../pool/credential.js';
import type { CallContext, ProviderCall, ProviderOutcome } from '../provider.js';
import { providerFailure } from '../provider.js';
import type { PromptResponse } from '../http.js';
import { isPromptPayload, isRecord, postJson, trimSlash } from '../http.js';

export const OPENAI_BASE_URL = 'https://api.openai.com';

export interface OpenAIProviderOptions {
  model: string;
  baseUrl?: string;
}

function extractContent(body: unknown): string | undefined {
  if (!isRecord(body) || !Array.isArray(body.choices)) return undefined;
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return undefined;
  return typeof first.message.content === 'string' ? first.message.content : undefined;
}

export class OpenAIProvider implements ProviderCall<unknown, PromptResponse> {
  readonly id = 'openai';
  private baseUrl: string;

  constructor(private options: OpenAIProviderOptions) {
    this.baseUrl = trimSlash(options.baseUrl ?? OPENAI_BASE_URL);
  }

  async call(payload: unknown, credential: Credential, context: CallContext): Promise<ProviderOutcome<PromptResponse>> {
    if (!isPromptPayload(payload)) {
      return providerFailure('invalid_response', 'Payload must be an object with a non-empty prompt');
    }

    const model = payload.model ?? this.options.model;
    const messages: Array<{ role: string; content: string }> = [];
    if (payload.system) messages.push({ role: 'system', content: payload.system });
    messages.push({ role: 'user', content: payload.prompt });

    const body = {
      model,
      messages,
      ...(payload.temperature !== undefined ? { temperature: payload.temperature } : {}),
      ...(payload.maxTokens !== undefined ? { max_tokens: payload.maxTokens } : {}),
    };

    const outcome = await postJson(
      `${this.baseUrl}/v1/chat/completions`,
      { authorization: `Bearer ${credential.apiKey}` },
      body,
      context.signal,
    );
    if (!outcome.ok) return outcome;

    const text = extractContent(outcome.response);
    if (text === undefined) {
      return providerFailure('invalid_response', 'Response has no message content');
    }
    return { ok: true, response: { text, model } };
  }
}

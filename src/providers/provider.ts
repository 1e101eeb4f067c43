import type { Credential } from '../pool/credential.js';
import type { ProviderErrorKind } from '../errors.js';

export interface CallContext {
  /** Aborted when the deadline passes or the caller gives up on the attempt */
  signal: AbortSignal;
  /** Absolute deadline, epoch ms */
  deadline: number;
}

export type ProviderOutcome<R = unknown> =
  | { ok: true; response: R }
  | { ok: false; kind: ProviderErrorKind; message: string };

/**
 * The network call for one provider. Implementations encode the payload
 * in the provider's wire format and report failures as a kind rather
 * than throwing; a thrown error is treated as a transport error.
 */
export interface ProviderCall<P = unknown, R = unknown> {
  /** Provider identifier, matching the pool it draws keys from */
  readonly id: string;

  call(payload: P, credential: Credential, context: CallContext): Promise<ProviderOutcome<R>>;
}

export function providerFailure(kind: ProviderErrorKind, message: string): ProviderOutcome<never> {
  return { ok: false, kind, message };
}

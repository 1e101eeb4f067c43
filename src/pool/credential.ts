/** One API key bound to one provider, as seen from outside its pool. */
export interface Credential {
  readonly id: string;
  readonly provider: string;
  /** Position in the pool's sequence */
  readonly index: number;
  readonly apiKey: string;
  readonly consecutiveFailures: number;
  /** Epoch ms; absent when the key is not quarantined */
  readonly quarantinedUntil?: number;
  readonly lastUsedAt?: number;
  readonly totalAcquired: number;
  readonly totalFailed: number;
}

/** Pool-internal record; only CredentialPool writes to these fields. */
export interface CredentialState {
  id: string;
  provider: string;
  index: number;
  apiKey: string;
  consecutiveFailures: number;
  quarantinedUntil?: number;
  lastUsedAt?: number;
  totalAcquired: number;
  totalFailed: number;
}

export function createCredential(provider: string, index: number, apiKey: string): CredentialState {
  return {
    id: `${provider}#${index}`,
    provider,
    index,
    apiKey,
    consecutiveFailures: 0,
    totalAcquired: 0,
    totalFailed: 0,
  };
}

/** `AIza…wxyz`: enough to tell keys apart in logs and tables. */
export function maskKey(apiKey: string): string {
  if (apiKey.length <= 8) return '*'.repeat(apiKey.length);
  return `${apiKey.slice(0, 4)}…${apiKey.slice(-4)}`;
}

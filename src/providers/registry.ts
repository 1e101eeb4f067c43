import type { KeyrelayConfig } from '../config/schema.js';
import type { ProviderCall } from './provider.js';
import { GeminiProvider } from './adapters/gemini.js';
import { OpenAIProvider } from './adapters/openai.js';
import { UnknownProviderError } from '../errors.js';
import { logger } from '../utils/logger.js';

type ProviderFactory = (options: { model: string; baseUrl?: string }) => ProviderCall;

const BUILTIN_FACTORIES: Record<string, ProviderFactory> = {
  gemini: options => new GeminiProvider(options),
  openai: options => new OpenAIProvider(options),
};

export function builtinProviderIds(): string[] {
  return Object.keys(BUILTIN_FACTORIES);
}

/** Provider calls keyed by provider id. */
export class ProviderRegistry {
  private providers = new Map<string, ProviderCall>();

  /** Registry holding a built-in provider for every enabled provider in the config */
  static fromConfig(config: KeyrelayConfig): ProviderRegistry {
    const registry = new ProviderRegistry();
    for (const [id, providerConfig] of Object.entries(config.providers)) {
      if (!providerConfig.enabled) continue;
      const factory = BUILTIN_FACTORIES[id];
      if (!factory) {
        logger.debug(`Provider ${id} has no built-in client; register one before dispatching`);
        continue;
      }
      registry.register(factory({ model: providerConfig.model, baseUrl: providerConfig.baseUrl }));
    }
    return registry;
  }

  register(provider: ProviderCall): void {
    this.providers.set(provider.id, provider);
  }

  get(id: string): ProviderCall | undefined {
    return this.providers.get(id);
  }

  require(id: string): ProviderCall {
    const provider = this.providers.get(id);
    if (!provider) throw new UnknownProviderError(id);
    return provider;
  }

  has(id: string): boolean {
    return this.providers.has(id);
  }

  list(): string[] {
    return Array.from(this.providers.keys());
  }
}

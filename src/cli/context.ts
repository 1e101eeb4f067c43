import type { KeyrelayConfig } from '../config/schema.js';
import { loadConfig } from '../config/config.js';
import { DispatchService } from '../scheduler/service.js';
import { setLogLevel } from '../utils/logger.js';

export interface AppContext {
  config: KeyrelayConfig;
  service: DispatchService;
}

let cachedContext: AppContext | null = null;
let verbose = false;

/** `--verbose` wins over the configured log level */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export async function getContext(): Promise<AppContext> {
  if (cachedContext) return cachedContext;

  const config = await loadConfig();
  setLogLevel(verbose ? 'debug' : config.logLevel);

  const service = DispatchService.fromConfig(config);

  cachedContext = { config, service };
  return cachedContext;
}

import type { Command } from 'commander';
import { getContext } from '../context.js';
import { printJson, printTable, isJsonOutput } from '../output.js';
import { maskKey } from '../../pool/credential.js';
import type { KeyrelayConfig } from '../../config/schema.js';

export function maskConfig(config: KeyrelayConfig): KeyrelayConfig {
  const providers: KeyrelayConfig['providers'] = {};
  for (const [id, p] of Object.entries(config.providers)) {
    providers[id] = { ...p, apiKeys: p.apiKeys.map(maskKey) };
  }
  return { ...config, providers };
}

function formatSetting(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value);
    return entries.length > 0 ? entries.map(([k, v]) => `${k}=${String(v)}`).join(', ') : '-';
  }
  return String(value);
}

export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Show the effective configuration (keys masked)')
    .action(async () => {
      const ctx = await getContext();
      const masked = maskConfig(ctx.config);

      if (isJsonOutput()) {
        printJson(masked);
        return;
      }

      const { providers, ...settings } = masked;
      printTable(
        ['Setting', 'Value'],
        Object.entries(settings).map(([key, value]) => [key, formatSetting(value)]),
      );
      printTable(
        ['Provider', 'Enabled', 'Model', 'Keys', 'Base URL'],
        Object.entries(providers).map(([id, p]) => [
          id,
          p.enabled ? 'yes' : 'no',
          p.model,
          p.apiKeys.length > 0 ? p.apiKeys.join(', ') : '-',
          p.baseUrl ?? 'default',
        ]),
      );
    });
}

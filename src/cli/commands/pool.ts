import type { Command } from 'commander';
import chalk from 'chalk';
import { getContext } from '../context.js';
import { printTable, printJson, printWarning, isJsonOutput, statusColor, formatDuration } from '../output.js';
import { UnknownProviderError } from '../../errors.js';
import type { ProviderPoolSummary } from '../../pool/tracker.js';

function healthBar(healthy: number, size: number, width = 12): string {
  if (size === 0) return chalk.gray('░'.repeat(width));
  const pct = healthy / size;
  const filled = Math.round(pct * width);
  const color = pct > 0.6 ? chalk.green : pct > 0.3 ? chalk.yellow : chalk.red;
  return color('█'.repeat(filled)) + chalk.gray('░'.repeat(width - filled)) + ` ${healthy}/${size}`;
}

export function registerPoolCommand(program: Command): void {
  program
    .command('pool [provider]')
    .description('Show API key health per provider')
    .action(async (provider?: string) => {
      const ctx = await getContext();
      const tracker = ctx.service.pools;

      let summaries: ProviderPoolSummary[];
      if (provider) {
        const summary = tracker.getSummary(provider);
        if (!summary) throw new UnknownProviderError(provider);
        summaries = [summary];
      } else {
        summaries = tracker.getAllSummaries();
      }

      if (isJsonOutput()) {
        printJson(summaries);
        return;
      }

      for (const summary of summaries) {
        console.log(`${chalk.bold(summary.provider)} ${chalk.gray(summary.strategy)} ${healthBar(summary.healthy, summary.size)}`);
        if (summary.size === 0) {
          printWarning(`No API keys configured for ${summary.provider}`);
          continue;
        }

        const rows = summary.credentials.map(c => [
          c.id,
          c.key,
          statusColor(c.health),
          String(c.consecutiveFailures),
          c.quarantinedForMs !== undefined ? formatDuration(c.quarantinedForMs) : '-',
          String(c.totalAcquired),
          String(c.totalFailed),
          c.lastUsedAt?.slice(11, 19) ?? '-',
        ]);

        printTable(
          ['Key', 'Value', 'Health', 'Fails In Row', 'Quarantine', 'Acquired', 'Failed', 'Last Used'],
          rows,
        );
      }
    });
}

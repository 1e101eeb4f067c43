import type { Command } from 'commander';
import ora from 'ora';
import { getContext } from '../context.js';
import { printError, printSuccess, printWarning, printJson, printTable, isJsonOutput, statusColor, formatDuration } from '../output.js';
import { parsePositiveCount, responseText, truncate } from '../parsers.js';
import { readBatchFile } from '../batch-file.js';
import { errorMessage } from '../../errors.js';
import type { BatchResult } from '../../scheduler/types.js';

export function registerBatchCommand(program: Command): void {
  program
    .command('batch <file>')
    .description('Run a JSON5 file of prompts as one batch')
    .option('-c, --concurrency <n>', 'workers for this batch (capped by maxParallelApiKeys)', parsePositiveCount)
    .action(async (file: string, options: { concurrency?: number }) => {
      const ctx = await getContext();
      const entries = await readBatchFile(file);
      const requests = entries.map(e => ctx.service.createRequest(e.payload, { provider: e.provider }));

      const spinner = isJsonOutput() ? null : ora(`Running ${requests.length} request(s)...`).start();
      let settled = 0;

      let batch: BatchResult;
      try {
        batch = await ctx.service.dispatchBatch(requests, {
          concurrencyLimit: options.concurrency,
          onSettled: () => {
            settled++;
            if (spinner) spinner.text = `Running ${requests.length} request(s)... ${settled} settled`;
          },
        });
        spinner?.stop();
      } catch (err) {
        spinner?.stop();
        printError(`Batch rejected: ${errorMessage(err)}`);
        process.exitCode = 1;
        return;
      }

      if (batch.failed > 0) process.exitCode = 1;

      if (isJsonOutput()) {
        printJson(batch);
        return;
      }

      printTable(
        ['#', 'Request', 'Provider', 'State', 'Attempts', 'Time', 'Output'],
        batch.results.map((r, i) => [
          String(i),
          r.requestId,
          r.provider,
          statusColor(r.state),
          String(r.attempts.length),
          formatDuration(r.durationMs),
          truncate(r.ok ? responseText(r.response) : r.failure.message, 60),
        ]),
      );

      const summary = `Batch ${batch.batchId}: ${batch.succeeded}/${batch.results.length} succeeded in ${formatDuration(batch.durationMs)}`;
      if (batch.failed === 0) {
        printSuccess(summary);
      } else {
        printWarning(batch.timedOut ? `${summary} (batch deadline reached)` : summary);
      }
    });
}

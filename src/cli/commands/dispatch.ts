import type { Command } from 'commander';
import ora from 'ora';
import { getContext } from '../context.js';
import { printSuccess, printError, printJson, printTable, isJsonOutput, statusColor, formatDuration } from '../output.js';
import { parseCount, parseSeconds, responseText, winningCredential, truncate } from '../parsers.js';
import type { PromptPayload } from '../../providers/http.js';

export function registerDispatchCommand(program: Command): void {
  program
    .command('dispatch <prompt>')
    .description('Send one prompt through the key pool')
    .option('-p, --provider <id>', 'provider to call (defaults to defaultProvider)')
    .option('-s, --system <text>', 'system instruction')
    .option('-m, --model <name>', 'model override')
    .option('--timeout <seconds>', 'first-attempt deadline', parseSeconds)
    .option('--retries <n>', 'retries after the first attempt', parseCount)
    .action(async (prompt: string, options: {
      provider?: string;
      system?: string;
      model?: string;
      timeout?: number;
      retries?: number;
    }) => {
      const ctx = await getContext();

      const payload: PromptPayload = {
        prompt,
        ...(options.system ? { system: options.system } : {}),
        ...(options.model ? { model: options.model } : {}),
      };
      const request = ctx.service.createRequest(payload, {
        provider: options.provider,
        timeoutMs: options.timeout,
        maxRetries: options.retries,
      });

      if (isJsonOutput()) {
        const result = await ctx.service.dispatchOne(request);
        printJson(result);
        if (!result.ok) process.exitCode = 1;
        return;
      }

      const mode = ctx.service.usesRacer(request.provider) ? 'Racing' : 'Dispatching';
      const spinner = ora(`${mode} ${request.id} via ${request.provider}...`).start();
      const result = await ctx.service.dispatchOne(request);
      spinner.stop();

      if (result.ok) {
        printSuccess(`${request.id} answered by ${winningCredential(result) ?? request.provider} (${formatDuration(result.durationMs)})`);
        console.log('\n' + responseText(result.response).trim());
      } else {
        printError(`${request.id} ${statusColor(result.state)}: ${result.failure.message}`);
        process.exitCode = 1;
      }

      if (result.attempts.length > 1 || !result.ok) {
        console.log();
        printTable(
          ['#', 'Key', 'Outcome', 'Latency', 'Detail'],
          result.attempts.map(a => [
            String(a.attempt),
            a.credentialId,
            a.outcome,
            formatDuration(a.latencyMs),
            truncate(a.message ?? '', 60),
          ]),
        );
      }
    });
}

import { Command } from 'commander';
import { setJsonOutput } from './output.js';
import { setVerbose } from './context.js';
import { registerPoolCommand } from './commands/pool.js';
import { registerDispatchCommand } from './commands/dispatch.js';
import { registerBatchCommand } from './commands/batch.js';
import { registerConfigCommand } from './commands/config.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('keyrelay')
    .description('Dispatch LLM calls across pooled API keys with failover and batching')
    .version('0.1.0')
    .option('--json', 'output in JSON format')
    .option('-v, --verbose', 'log every attempt')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts();
      if (opts.json) {
        setJsonOutput(true);
      }
      if (opts.verbose) {
        setVerbose(true);
      }
    });

  registerPoolCommand(program);
  registerDispatchCommand(program);
  registerBatchCommand(program);
  registerConfigCommand(program);

  return program;
}

export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}

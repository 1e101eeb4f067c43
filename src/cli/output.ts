import chalk from 'chalk';
import Table from 'cli-table3';

let jsonMode = false;

export function setJsonOutput(enabled: boolean): void {
  jsonMode = enabled;
}

export function isJsonOutput(): boolean {
  return jsonMode;
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printTable(headers: string[], rows: string[][]): void {
  if (jsonMode) {
    const data = rows.map(row => {
      const obj: Record<string, string> = {};
      headers.forEach((h, i) => { obj[h] = row[i]; });
      return obj;
    });
    printJson(data);
    return;
  }

  const table = new Table({
    head: headers.map(h => chalk.cyan(h)),
    style: { head: [], border: [] },
  });
  table.push(...rows);
  console.log(table.toString());
}

export function printSuccess(msg: string): void {
  if (jsonMode) {
    printJson({ status: 'success', message: msg });
  } else {
    console.log(chalk.green('✓ ') + msg);
  }
}

export function printError(msg: string): void {
  if (jsonMode) {
    printJson({ status: 'error', message: msg });
  } else {
    console.error(chalk.red('✗ ') + msg);
  }
}

export function printWarning(msg: string): void {
  if (jsonMode) {
    printJson({ status: 'warning', message: msg });
  } else {
    console.log(chalk.yellow('⚠ ') + msg);
  }
}

/** Colors request states and key health alike */
export function statusColor(status: string): string {
  switch (status) {
    case 'succeeded': case 'healthy': return chalk.green(status);
    case 'dispatched': case 'retrying': return chalk.blue(status);
    case 'degraded': case 'pending': return chalk.yellow(status);
    case 'quarantined': case 'failed_exhausted': case 'failed_nonretryable': case 'failed_timeout': return chalk.red(status);
    default: return status;
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60_000)}m${Math.round((ms % 60_000) / 1000)}s`;
}

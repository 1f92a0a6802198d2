import chalk from 'chalk';
import Table from 'cli-table3';
import { checkCredentials } from '../lib/credential-checker';

interface CheckOptions {
  storage?: boolean;    // --no-storage sets this to false
}

export async function checkCommand(options: CheckOptions): Promise<void> {
  console.log(chalk.blue('🩺 Checking credentials and tools\n'));

  const report = await checkCredentials({ storage: options.storage });

  const table = new Table({
    head: ['CHECK', 'STATUS', 'DETAIL'],
    colWidths: [22, 10, 50],
  });

  for (const check of report.checks) {
    table.push([
      check.name,
      check.ok ? chalk.green('ok') : chalk.red('missing'),
      check.detail,
    ]);
  }

  console.log(table.toString());

  const failed = report.checks.filter((check) => !check.ok);
  for (const check of failed) {
    if (!check.fix) continue;
    console.log(chalk.yellow(`\nTo fix "${check.name}":`));
    check.fix.forEach((step, i) => console.log(chalk.dim(`  ${i + 1}. ${step}`)));
  }

  if (!report.ok) {
    throw new Error(`${failed.length} check(s) failed`);
  }

  console.log(chalk.green('\n✅ Ready to upload'));
}

import chalk from 'chalk';
import Table from 'cli-table3';
import { stateManager } from '../lib/state-manager';
import { GITHUB_TOKEN_ENV, parseRepositorySlug } from '../types/global-config';

interface ConfigOptions {
  repo?: string;
  baseBranch?: string;
  gateway?: string;
  catalogInForks?: boolean;
  reset?: boolean;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  if (options.reset) {
    await stateManager.resetGlobalConfig();
    console.log(chalk.green('✅ Configuration reset to defaults'));
    return;
  }

  const changing =
    options.repo !== undefined ||
    options.baseBranch !== undefined ||
    options.gateway !== undefined ||
    options.catalogInForks !== undefined;

  // If no options provided, show current config
  if (!changing) {
    const config = await stateManager.loadGlobalConfig();
    const token = stateManager.getGitHubToken();

    console.log(chalk.blue('⚙️  Configuration\n'));

    const table = new Table({
      head: ['SETTING', 'VALUE'],
      colWidths: [20, 60],
    });
    table.push(
      ['Repository', `${config.repository.owner}/${config.repository.name}`],
      ['Base branch', config.repository.baseBranch],
      ['GitHub API', config.apiBaseUrl],
      ['IPFS gateway', config.gatewayUrl],
      ['Catalog in forks', config.catalogInForks ? 'yes' : 'no'],
      ['Fork retry', `${config.forkRetry.attempts} × ${config.forkRetry.delayMs}ms`],
      [GITHUB_TOKEN_ENV, token ? chalk.green('set') : chalk.red('not set')],
    );
    console.log(table.toString());

    console.log(chalk.dim(`\nConfig file: ${stateManager.getConfigPath()}`));
    console.log(chalk.dim('Change repository: modelpub config --repo <owner/name>'));
    return;
  }

  if (options.repo !== undefined) {
    const repo = parseRepositorySlug(options.repo);
    if (!repo) {
      throw new Error(`Invalid repository: ${options.repo} (expected owner/name)`);
    }
    await stateManager.setRepository(repo);
    console.log(chalk.green(`✅ Repository set to ${repo.owner}/${repo.name}`));
  }

  if (options.baseBranch !== undefined) {
    await stateManager.setRepository({ baseBranch: options.baseBranch });
    console.log(chalk.green(`✅ Base branch set to ${options.baseBranch}`));
  }

  if (options.gateway !== undefined) {
    let url: URL;
    try {
      url = new URL(options.gateway);
    } catch {
      throw new Error(`Invalid gateway URL: ${options.gateway}`);
    }
    await stateManager.updateGlobalConfig({ gatewayUrl: url.toString().replace(/\/+$/, '') });
    console.log(chalk.green(`✅ Gateway set to ${url.toString().replace(/\/+$/, '')}`));
  }

  if (options.catalogInForks !== undefined) {
    await stateManager.updateGlobalConfig({ catalogInForks: options.catalogInForks });
    console.log(chalk.green(`✅ Catalog updates on fork submissions: ${options.catalogInForks ? 'on' : 'off'}`));
  }
}

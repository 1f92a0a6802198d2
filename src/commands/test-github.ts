import chalk from 'chalk';
import { stateManager } from '../lib/state-manager';
import { createGitHubPublisher } from '../lib/github-publisher';
import { silentReporter } from '../lib/reporter';

export async function testGithubCommand(): Promise<void> {
  const token = stateManager.requireGitHubToken();
  const config = await stateManager.loadGlobalConfig();
  const publisher = createGitHubPublisher(config, token, silentReporter);
  const repo = `${config.repository.owner}/${config.repository.name}`;

  console.log(chalk.blue('🔑 Testing GitHub API access...\n'));

  const check = await publisher.verifyAccess();
  if (!check.ok) {
    if (check.stage === 'user') {
      throw new Error(`Failed to authenticate with GitHub: ${check.error.message}`);
    }
    throw new Error(`Failed to access repository ${repo}: ${check.error.message}`);
  }

  console.log(chalk.green(`✅ Connected to GitHub as: ${check.login}`));
  console.log(chalk.green(`✅ Repository accessible: ${check.repository}`));

  const access = await publisher.resolveAccess();
  switch (access.kind) {
    case 'authorized':
      console.log(chalk.dim('   Push access: yes (submissions use a branch in the repository)'));
      break;
    case 'unauthorized':
      console.log(chalk.dim('   Push access: no (submissions go through your fork)'));
      break;
    case 'transport-error':
      console.log(chalk.yellow(`⚠️  Could not determine push access: ${access.detail}`));
      break;
  }
}

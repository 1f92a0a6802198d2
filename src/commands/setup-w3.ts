import chalk from 'chalk';
import { storagePublisher, W3_PACKAGE } from '../lib/storage-publisher';
import { confirm } from '../utils/prompt-utils';

interface SetupOptions {
  email?: string;
  space: string;
}

export async function setupW3Command(options: SetupOptions): Promise<void> {
  // 1. w3 CLI
  if (!(await storagePublisher.isInstalled())) {
    console.log(chalk.yellow('⚠️  w3 CLI not found.'));

    const install = await confirm(`Install it now with npm (npm i --global ${W3_PACKAGE})?`);
    if (!install) {
      throw new Error(`Install the w3 CLI manually: npm i --global ${W3_PACKAGE}`);
    }

    console.log(chalk.dim('This may take a moment...'));
    const result = await storagePublisher.install();
    if (result.exitCode !== 0) {
      throw new Error(`Failed to install w3 CLI. Install it manually: npm i --global ${W3_PACKAGE}\n\n${result.stderr}`);
    }
    console.log(chalk.green('✅ Installed w3 CLI'));
  }

  // 2. Login
  const status = await storagePublisher.getLoginStatus();
  if (!status.loggedIn) {
    if (!options.email) {
      throw new Error(
        'Not logged in to web3.storage. Provide an email address:\n\n' +
        '  modelpub setup-w3 --email your.email@example.com'
      );
    }

    console.log(chalk.blue(`📧 Logging in with email: ${options.email}`));
    console.log(chalk.dim('A verification link will be sent to your email.'));
    await storagePublisher.login(options.email);

    console.log(chalk.green('✅ Login process initiated. Check your email for a verification link.'));
    console.log(chalk.dim('After clicking the link, run this command again to create a space.'));
    return;
  }

  console.log(chalk.green(`✅ Logged in to web3.storage${status.did ? ` as ${status.did}` : ''}`));

  // 3. Space
  if (status.hasSpace) {
    console.log(chalk.green('✅ Space already exists. You are ready to upload models.'));
    return;
  }

  console.log(chalk.yellow(`No space found. Creating "${options.space}"...`));
  await storagePublisher.createAndUseSpace(options.space);
  console.log(chalk.green('✅ web3.storage is set up. You are ready to upload models.'));
}

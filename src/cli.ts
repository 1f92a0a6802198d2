#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { uploadCommand } from './commands/upload';
import { downloadCommand } from './commands/download';
import { generateFilesCommand } from './commands/generate-files';
import { testGithubCommand } from './commands/test-github';
import { checkCommand } from './commands/check';
import { setupW3Command } from './commands/setup-w3';
import { configCommand } from './commands/config';

const program = new Command();

function fail(error: unknown): never {
  console.error(chalk.red('❌ Error:'), (error as Error).message);
  process.exit(1);
}

function parseSwitch(value: string): boolean {
  const normalized = value.toLowerCase();
  if (['on', 'yes', 'true', '1'].includes(normalized)) return true;
  if (['off', 'no', 'false', '0'].includes(normalized)) return false;
  throw new InvalidArgumentError(`Expected on/off, got: ${value}`);
}

program
  .name('modelpub')
  .description('Upload models to IPFS and submit them to a GitHub model catalog')
  .version('1.0.0')
  .addHelpText('after', `
Environment variables:
  GITHUB_API_TOKEN   GitHub personal access token (required for GitHub operations)
  HF_TOKEN           HuggingFace token for gated or private models (optional)`);

// Upload and submit
program
  .command('upload')
  .description('Upload a model to IPFS and open a pull request adding it to the catalog')
  .argument('[path]', 'Model directory, or hf://owner/repo to download from HuggingFace first')
  .option('-n, --name <name>', 'Model name (default: directory name)')
  .option('-d, --description <text>', 'Model description (prompted if missing)')
  .option('-t, --tags <tags>', 'Comma-separated tags (prompted if missing)')
  .option('-c, --cid <cid>', 'Existing IPFS CID (skips the upload)')
  .action(async (target: string | undefined, options) => {
    try {
      await uploadCommand(target, options);
    } catch (error) {
      fail(error);
    }
  });

// Download from HuggingFace
program
  .command('download')
  .description('Download a model repository from HuggingFace')
  .argument('<model>', 'HuggingFace repository (owner/repo or hf://owner/repo)')
  .option('-o, --output <dir>', 'Directory to save the model (default: ~/.modelpub/downloads/<owner>/<repo>)')
  .option('-r, --revision <rev>', 'Branch, tag or commit (default: main)')
  .action(async (model: string, options) => {
    try {
      await downloadCommand(model, options);
    } catch (error) {
      fail(error);
    }
  });

// Files for manual submission
program
  .command('generate-files')
  .description('Generate catalog files for a manual submission (no pull request)')
  .option('-p, --path <dir>', 'Model directory (or hf://owner/repo)')
  .requiredOption('-n, --name <name>', 'Model name')
  .requiredOption('-d, --description <text>', 'Model description')
  .requiredOption('-t, --tags <tags>', 'Comma-separated tags')
  .option('-c, --cid <cid>', 'IPFS CID (uploads --path when omitted)')
  .option('-o, --output <dir>', 'Output directory', 'modelpub_files')
  .action(async (options) => {
    try {
      await generateFilesCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// GitHub access
program
  .command('test-github')
  .description('Test GitHub API access to the catalog repository')
  .action(async () => {
    try {
      await testGithubCommand();
    } catch (error) {
      fail(error);
    }
  });

// Preflight
program
  .command('check')
  .description('Check the GitHub token and the w3 CLI login')
  .option('--no-storage', 'Skip the w3 CLI checks')
  .action(async (options) => {
    try {
      await checkCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// web3.storage setup
program
  .command('setup-w3')
  .description('Set up the w3 CLI: install, log in and create a space')
  .option('-e, --email <email>', 'Email address for w3 login')
  .option('-s, --space <name>', 'Space to create', 'modelpub-space')
  .action(async (options) => {
    try {
      await setupW3Command(options);
    } catch (error) {
      fail(error);
    }
  });

// Configuration
program
  .command('config')
  .description('Show or change configuration')
  .option('--repo <owner/name>', 'Catalog repository pull requests target')
  .option('--base-branch <branch>', 'Base branch of the catalog repository')
  .option('--gateway <url>', 'IPFS gateway used in links')
  .option('--catalog-in-forks <on|off>', 'Also update the model map on fork submissions', parseSwitch)
  .option('--reset', 'Restore defaults')
  .action(async (options) => {
    try {
      await configCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// Parse arguments
program.parseAsync().catch(fail);

import chalk from 'chalk';
import * as path from 'path';
import { stateManager } from '../lib/state-manager';
import { checkCredentials } from '../lib/credential-checker';
import { storagePublisher } from '../lib/storage-publisher';
import { modelDownloader, HF_PREFIX } from '../lib/model-downloader';
import { createGitHubPublisher } from '../lib/github-publisher';
import { gatewayLink } from '../lib/model-packager';
import { isDirectory } from '../utils/file-utils';
import { parseTags } from '../utils/format-utils';
import { prompt } from '../utils/prompt-utils';

interface UploadOptions {
  name?: string;
  description?: string;
  tags?: string;
  cid?: string;
}

export async function uploadCommand(target: string | undefined, options: UploadOptions): Promise<void> {
  // 1. Token is required before anything touches the network
  const token = stateManager.requireGitHubToken();
  const config = await stateManager.loadGlobalConfig();

  if (!target && !options.cid) {
    throw new Error('Provide a model directory (or hf://owner/repo), or an existing --cid');
  }

  // 2. Resolve the model directory, downloading from HuggingFace if asked
  let modelPath: string | undefined;
  if (target?.startsWith(HF_PREFIX)) {
    const download = await modelDownloader.downloadRepository(target, undefined, {
      token: process.env.HF_TOKEN,
    });
    modelPath = download.directory;
    console.log();
  } else if (target) {
    modelPath = path.resolve(target);
    if (!(await isDirectory(modelPath))) {
      throw new Error(`Not a directory: ${target}`);
    }
  }

  // 3. Name, description and tags
  let name = options.name;
  if (!name && modelPath) {
    name = path.basename(modelPath);
    console.log(chalk.dim(`Using directory name as model name: ${name}`));
  }
  if (!name) {
    throw new Error('Model name is required (--name)');
  }

  const description = options.description ?? await prompt('Enter a description for the model');
  const tags = parseTags(options.tags ?? await prompt('Enter comma-separated tags for the model'));

  // 4. Preflight: token plus w3 CLI when we still have to upload
  const needsUpload = !options.cid;
  const report = await checkCredentials({ storage: needsUpload });
  const failed = report.checks.filter((check) => !check.ok);
  if (failed.length > 0) {
    for (const check of failed) {
      console.log(chalk.red(`✗ ${check.name}: ${check.detail}`));
      for (const step of check.fix ?? []) {
        console.log(chalk.dim(`    ${step}`));
      }
    }
    throw new Error('Credential check failed. Run: modelpub check');
  }

  // 5. Upload to IPFS
  let cid = options.cid;
  if (!cid) {
    if (!modelPath) {
      throw new Error('A model directory is required to upload');
    }
    console.log(chalk.blue(`📤 Uploading model to IPFS: ${modelPath}`));
    cid = await storagePublisher.upload(modelPath);
    console.log(chalk.green(`✅ Model uploaded to IPFS with CID: ${cid}`));
    console.log(chalk.dim(`   View your model at ${gatewayLink(config.gatewayUrl, cid)}`));
  }

  // 6. Pull request
  console.log();
  console.log(chalk.bold('Creating GitHub Pull Request...'));
  console.log(chalk.dim('  Direct push when you can write to the catalog repository, otherwise via your fork'));
  console.log();

  const publisher = createGitHubPublisher(config, token);

  const access = await publisher.verifyAccess();
  if (!access.ok) {
    throw new Error(`GitHub API access failed (${access.stage}): ${access.error.message}`);
  }
  console.log(chalk.dim(`Connected to GitHub as ${access.login}`));

  const result = await publisher.publish({ name, description, tags, cid, modelPath });

  console.log();
  if (result.status === 'published') {
    console.log(chalk.green.bold('🎉 Model submission complete!'));
    console.log(chalk.green(`   IPFS CID:     ${cid}`));
    console.log(chalk.green(`   Pull Request: ${result.prUrl}`));
    console.log();
    console.log(chalk.dim('The catalog maintainers will review your submission.'));
    return;
  }

  console.log(chalk.yellow('⚠️  Model was uploaded to IPFS but the GitHub PR process failed.'));
  console.log(chalk.green(`   IPFS CID:  ${cid}`));
  console.log(chalk.green(`   Access at: ${gatewayLink(config.gatewayUrl, cid)}`));
  console.log();
  console.log(chalk.dim(`Retry with: modelpub upload --cid ${cid} --name "${name}"`));
  console.log(chalk.dim('Or create the files for a manual submission: modelpub generate-files'));
  throw new Error(`Pull request failed at step "${result.step}": ${result.error.message}`);
}

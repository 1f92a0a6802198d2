import chalk from 'chalk';
import * as fs from 'fs/promises';
import * as path from 'path';
import { stateManager } from '../lib/state-manager';
import { storagePublisher } from '../lib/storage-publisher';
import { modelDownloader, HF_PREFIX } from '../lib/model-downloader';
import { createGitHubPublisher } from '../lib/github-publisher';
import { modelPackager, gatewayLink } from '../lib/model-packager';
import { ModelTreeEntry } from '../types/model-metadata';
import { GITHUB_TOKEN_ENV } from '../types/global-config';
import { ensureDir, isDirectory } from '../utils/file-utils';
import { parseTags } from '../utils/format-utils';
import { modelSlug } from '../utils/naming-utils';

interface GenerateFilesOptions {
  path?: string;
  name: string;
  description: string;
  tags: string;
  cid?: string;
  output: string;
}

export async function generateFilesCommand(options: GenerateFilesOptions): Promise<void> {
  const config = await stateManager.loadGlobalConfig();
  const token = stateManager.getGitHubToken();
  if (!token) {
    console.log(chalk.yellow(`⚠️  ${GITHUB_TOKEN_ENV} is not set; the author will be "anonymous"`));
  }

  if (!options.path && !options.cid) {
    throw new Error('Either --path or --cid must be provided');
  }

  // Resolve the model directory (HuggingFace download if asked)
  let modelPath: string | undefined;
  if (options.path?.startsWith(HF_PREFIX)) {
    const download = await modelDownloader.downloadRepository(options.path, undefined, {
      token: process.env.HF_TOKEN,
    });
    modelPath = download.directory;
  } else if (options.path) {
    modelPath = path.resolve(options.path);
    if (!(await isDirectory(modelPath))) {
      throw new Error(`Not a directory: ${options.path}`);
    }
  }

  // Upload to IPFS if no CID was given
  let cid = options.cid;
  if (!cid && modelPath) {
    console.log(chalk.blue(`📤 Uploading model to IPFS: ${modelPath}`));
    cid = await storagePublisher.upload(modelPath);
    console.log(chalk.green(`✅ Model uploaded to IPFS with CID: ${cid}`));
    console.log(chalk.dim(`   View your model at ${gatewayLink(config.gatewayUrl, cid)}`));
  }
  if (!cid) {
    throw new Error('Either --path or --cid must be provided');
  }

  // Author from the token, when there is one
  let author = 'anonymous';
  if (token) {
    try {
      author = await createGitHubPublisher(config, token).getUsername();
    } catch (error) {
      console.log(chalk.yellow(`⚠️  GitHub username not available, using "anonymous" (${(error as Error).message})`));
    }
  }

  let tree: ModelTreeEntry[] = [];
  let sizeMb = 0;
  if (modelPath) {
    const packaged = await modelPackager.packageDirectory(modelPath);
    tree = packaged.tree;
    sizeMb = packaged.sizeMb;
  }

  const metadata = modelPackager.buildMetadata({
    name: options.name,
    description: options.description,
    author,
    tags: parseTags(options.tags),
    cid,
    sizeMb,
  });

  const outputDir = path.resolve(options.output);
  const modelDir = path.join(outputDir, author, modelSlug(options.name));
  await ensureDir(modelDir);

  await fs.writeFile(path.join(modelDir, 'metadata.json'), JSON.stringify(metadata, null, 2), 'utf-8');
  await fs.writeFile(path.join(modelDir, 'README.md'), modelPackager.generateReadme(metadata, config.gatewayUrl), 'utf-8');
  await fs.writeFile(path.join(modelDir, 'tree.json'), JSON.stringify(tree, null, 2), 'utf-8');

  const guidePath = path.join(outputDir, 'GUIDE.md');
  await fs.writeFile(
    guidePath,
    modelPackager.generateSubmissionGuide(metadata, config.repository, config.gatewayUrl, modelDir),
    'utf-8'
  );

  console.log(chalk.green(`✅ Files generated at: ${outputDir}`));
  console.log(chalk.dim(`   Follow the instructions in ${guidePath} to submit your model.`));
}

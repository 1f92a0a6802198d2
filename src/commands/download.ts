import chalk from 'chalk';
import { modelDownloader } from '../lib/model-downloader';

interface DownloadCommandOptions {
  output?: string;
  revision?: string;
}

export async function downloadCommand(identifier: string, options: DownloadCommandOptions): Promise<void> {
  try {
    const result = await modelDownloader.downloadRepository(identifier, options.output, {
      revision: options.revision,
      token: process.env.HF_TOKEN,
    });

    console.log();
    console.log(chalk.dim(`Upload it: modelpub upload ${result.directory}`));
  } catch (error) {
    if ((error as Error).message.includes('HTTP 401') || (error as Error).message.includes('HTTP 403')) {
      console.log(chalk.dim('\nThis repository may be gated or private. Set HF_TOKEN and try again.'));
    }
    throw error;
  }
}

import * as https from 'https';
import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { getDownloadsDir } from '../utils/file-utils';
import { formatBytes } from '../utils/format-utils';

export const HF_PREFIX = 'hf://';

export interface DownloadOptions {
  silent?: boolean;       // Suppress console output
  revision?: string;      // Branch, tag or commit (default: main)
  token?: string;         // HuggingFace token for gated/private repositories
}

export interface RepositoryDownload {
  repoId: string;
  directory: string;
  files: string[];
  skipped: string[];      // Already present locally with the expected size
}

interface RemoteFile {
  name: string;
  size: number | null;
}

export class ModelDownloader {
  private apiBaseUrl: string;
  private hubBaseUrl: string;

  constructor(hubBaseUrl = 'https://huggingface.co') {
    this.hubBaseUrl = hubBaseUrl.replace(/\/+$/, '');
    this.apiBaseUrl = `${this.hubBaseUrl}/api`;
  }

  /**
   * Parse a HuggingFace identifier
   * Examples:
   *   "hf://alice/tiny-model" → "alice/tiny-model"
   *   "alice/tiny-model"      → "alice/tiny-model"
   */
  parseHFIdentifier(identifier: string): string {
    const repoId = identifier.startsWith(HF_PREFIX) ? identifier.slice(HF_PREFIX.length) : identifier;
    const parts = repoId.split('/');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new Error(`Invalid Hugging Face identifier: ${identifier} (expected owner/repo)`);
    }
    return repoId;
  }

  /**
   * Default local directory for a repository download
   */
  defaultDirectory(repoId: string): string {
    return path.join(getDownloadsDir(), ...repoId.split('/'));
  }

  /**
   * Build Hugging Face download URL
   */
  buildDownloadUrl(repoId: string, filename: string, revision = 'main'): string {
    const encodedFile = filename.split('/').map(encodeURIComponent).join('/');
    return `${this.hubBaseUrl}/${repoId}/resolve/${encodeURIComponent(revision)}/${encodedFile}`;
  }

  /**
   * List files of a model repository
   */
  async listFiles(repoId: string, options: DownloadOptions = {}): Promise<RemoteFile[]> {
    const revision = options.revision ?? 'main';
    const url = `${this.apiBaseUrl}/models/${repoId}/revision/${encodeURIComponent(revision)}?blobs=true`;

    const response = await fetch(url, {
      headers: options.token ? { Authorization: `Bearer ${options.token}` } : {},
      signal: AbortSignal.timeout(30000),
    });

    if (!response.ok) {
      throw new Error(`Failed to list files of ${repoId}: HTTP ${response.status} ${response.statusText}`);
    }

    const info: unknown = await response.json();
    const siblings: unknown = typeof info === 'object' && info !== null ? Reflect.get(info, 'siblings') : null;
    if (!Array.isArray(siblings)) {
      return [];
    }

    const files: RemoteFile[] = [];
    for (const sibling of siblings) {
      if (typeof sibling !== 'object' || sibling === null) continue;
      const name: unknown = Reflect.get(sibling, 'rfilename');
      const size: unknown = Reflect.get(sibling, 'size');
      if (typeof name === 'string' && name.length > 0) {
        files.push({ name, size: typeof size === 'number' ? size : null });
      }
    }
    return files;
  }

  /**
   * Download a file via HTTPS with progress tracking, following redirects
   */
  private downloadFile(
    url: string,
    destPath: string,
    headers: Record<string, string>,
    onProgress?: (downloaded: number, total: number) => void
  ): Promise<void> {
    return new Promise((resolve, reject) => {
      const request = https.get(url, { headers, agent: new https.Agent({ keepAlive: false }) }, (response) => {
        const status = response.statusCode ?? 0;

        // Handle redirects (301, 302, 307, 308); the CDN host gets no auth header
        if ([301, 302, 307, 308].includes(status) && response.headers.location) {
          response.resume();
          const redirectUrl = new URL(response.headers.location, url).toString();
          const sameHost = new URL(redirectUrl).host === new URL(url).host;
          this.downloadFile(redirectUrl, destPath, sameHost ? headers : {}, onProgress)
            .then(resolve)
            .catch(reject);
          return;
        }

        if (status !== 200) {
          response.resume();
          reject(new Error(`HTTP ${status}: ${response.statusMessage ?? ''}`.trim()));
          return;
        }

        const total = parseInt(response.headers['content-length'] || '0', 10);
        let downloaded = 0;
        let lastUpdate = 0;
        const file = fs.createWriteStream(destPath);

        response.on('data', (chunk: Buffer) => {
          downloaded += chunk.length;
          const now = Date.now();
          if (onProgress && now - lastUpdate >= 500) {
            onProgress(downloaded, total);
            lastUpdate = now;
          }
        });

        response.pipe(file);

        file.on('finish', () => {
          onProgress?.(downloaded, total);
          file.close((err) => (err ? reject(err) : resolve()));
        });

        const fail = (err: Error) => {
          file.destroy();
          fs.unlink(destPath, () => reject(err));
        };
        file.on('error', fail);
        response.on('error', fail);
      });

      request.on('error', reject);
    });
  }

  /**
   * Display progress bar
   */
  private displayProgress(downloaded: number, total: number, label: string): void {
    const percentage = total > 0 ? (downloaded / total) * 100 : 0;
    const barLength = 30;
    const filledLength = total > 0 ? Math.round((barLength * downloaded) / total) : 0;
    const bar = '█'.repeat(filledLength) + '░'.repeat(barLength - filledLength);

    process.stdout.write('\r\x1b[K');
    process.stdout.write(
      chalk.blue(`[${bar}] ${percentage.toFixed(1)}% | ${formatBytes(downloaded)} / ${formatBytes(total)} ${chalk.dim(label)}`)
    );
  }

  /**
   * Download every file of a model repository into a directory.
   * Files already present with the expected size are skipped, so an
   * interrupted download can be resumed by running it again.
   */
  async downloadRepository(
    identifier: string,
    outputDir?: string,
    options: DownloadOptions = {}
  ): Promise<RepositoryDownload> {
    const repoId = this.parseHFIdentifier(identifier);
    const directory = path.resolve(outputDir ?? this.defaultDirectory(repoId));
    const silent = options.silent ?? false;
    const headers: Record<string, string> = options.token ? { Authorization: `Bearer ${options.token}` } : {};

    if (!silent) {
      console.log(chalk.blue(`📥 Downloading ${repoId} from Hugging Face...`));
      console.log(chalk.dim(`Destination: ${directory}`));
      console.log();
    }

    const remoteFiles = await this.listFiles(repoId, options);
    if (remoteFiles.length === 0) {
      throw new Error(`No files found in ${repoId}`);
    }

    await fs.promises.mkdir(directory, { recursive: true });

    const files: string[] = [];
    const skipped: string[] = [];

    for (let i = 0; i < remoteFiles.length; i++) {
      const remote = remoteFiles[i];
      const destPath = path.join(directory, ...remote.name.split('/'));
      const label = `[${i + 1}/${remoteFiles.length}] ${remote.name}`;

      const existing = await fs.promises.stat(destPath).catch(() => null);
      if (existing && remote.size !== null && existing.size === remote.size) {
        skipped.push(remote.name);
        if (!silent) console.log(chalk.dim(`⏭️  ${label} (already downloaded)`));
        continue;
      }

      await fs.promises.mkdir(path.dirname(destPath), { recursive: true });
      await this.downloadFile(
        this.buildDownloadUrl(repoId, remote.name, options.revision),
        destPath,
        headers,
        silent ? undefined : (downloaded, total) => this.displayProgress(downloaded, total, label)
      );
      files.push(remote.name);

      if (!silent) {
        process.stdout.write('\r\x1b[K');
        console.log(chalk.green(`✅ ${label}`));
      }
    }

    if (!silent) {
      console.log();
      console.log(chalk.green(`✅ Download complete: ${files.length} downloaded, ${skipped.length} skipped`));
      console.log(chalk.dim(`   Location: ${directory}`));
    }

    return { repoId, directory, files, skipped };
  }
}

// Export singleton instance
export const modelDownloader = new ModelDownloader();

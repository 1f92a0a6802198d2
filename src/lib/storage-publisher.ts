import { runCommand, CommandResult } from '../utils/process-utils';

export const W3_PACKAGE = '@web3-storage/w3cli';

const GATEWAY_CID_PATTERN = /\/ipfs\/([A-Za-z0-9]+)/;
const BARE_CID_PATTERN = /\b(bafy[a-z2-7]{20,}|Qm[1-9A-HJ-NP-Za-km-z]{44})\b/;

export interface LoginStatus {
  loggedIn: boolean;
  did: string | null;
  hasSpace: boolean;
}

/**
 * Extract a content identifier from `w3 up` output
 * Example: "⁂ https://w3s.link/ipfs/bafybeigdyr..." → "bafybeigdyr..."
 */
export function parseCid(output: string): string | null {
  const gatewayMatch = output.match(GATEWAY_CID_PATTERN);
  if (gatewayMatch) {
    return gatewayMatch[1];
  }

  const bareMatch = output.match(BARE_CID_PATTERN);
  return bareMatch ? bareMatch[1] : null;
}

/**
 * Wraps the web3.storage `w3` CLI
 */
export class StoragePublisher {
  constructor(private binary = 'w3') {}

  private async run(args: string[]): Promise<CommandResult | null> {
    try {
      return await runCommand(this.binary, args);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  /**
   * Check if the w3 CLI is installed
   */
  async isInstalled(): Promise<boolean> {
    const result = await this.run(['--version']);
    return result !== null && result.exitCode === 0;
  }

  /**
   * Install the w3 CLI globally with npm
   */
  async install(): Promise<CommandResult> {
    return runCommand('npm', ['i', '--global', W3_PACKAGE]);
  }

  /**
   * Current agent DID and whether a space is available
   */
  async getLoginStatus(): Promise<LoginStatus> {
    const didResult = await this.run(['did']);
    if (!didResult || didResult.exitCode !== 0 || !didResult.stdout.includes('did:key:')) {
      return { loggedIn: false, did: null, hasSpace: false };
    }

    const did = didResult.stdout.match(/did:key:[A-Za-z0-9]+/)?.[0] ?? null;
    const spaces = await this.run(['space', 'ls']);
    const hasSpace = spaces !== null && spaces.exitCode === 0 && spaces.stdout.length > 0;

    return { loggedIn: true, did, hasSpace };
  }

  /**
   * Start an email login (the user confirms through a link)
   */
  async login(email: string): Promise<void> {
    const result = await this.requireRun(['login', '--email', email]);
    if (result.exitCode !== 0) {
      throw new Error(`w3 login failed: ${result.stderr || result.stdout}`);
    }
  }

  /**
   * Create a space and make it the current one
   */
  async createAndUseSpace(name: string): Promise<void> {
    const created = await this.requireRun(['space', 'create', name]);
    if (created.exitCode !== 0) {
      throw new Error(`Failed to create space "${name}": ${created.stderr || created.stdout}`);
    }

    const used = await this.requireRun(['space', 'use', name]);
    if (used.exitCode !== 0) {
      throw new Error(`Failed to use space "${name}": ${used.stderr || used.stdout}`);
    }
  }

  /**
   * Upload a directory and return its content identifier
   */
  async upload(dirPath: string): Promise<string> {
    const result = await this.requireRun(['up', dirPath]);
    if (result.exitCode !== 0) {
      throw new Error(`w3 up failed (exit ${result.exitCode}): ${result.stderr || result.stdout}`);
    }

    const cid = parseCid(result.stdout) ?? parseCid(result.stderr);
    if (!cid) {
      throw new Error(`Could not find a CID in w3 output:\n${result.stdout}`);
    }
    return cid;
  }

  private async requireRun(args: string[]): Promise<CommandResult> {
    const result = await this.run(args);
    if (!result) {
      throw new Error(`w3 CLI not found. Install it with: npm i --global ${W3_PACKAGE}`);
    }
    return result;
  }
}

// Export singleton instance
export const storagePublisher = new StoragePublisher();

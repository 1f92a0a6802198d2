import { GITHUB_TOKEN_ENV } from '../types/global-config';
import { stateManager } from './state-manager';
import { storagePublisher, W3_PACKAGE } from './storage-publisher';

export interface CredentialCheck {
  name: string;
  ok: boolean;
  detail: string;
  fix?: string[];           // Steps shown to the user when the check fails
}

export interface CredentialReport {
  ok: boolean;
  checks: CredentialCheck[];
}

export interface CredentialCheckOptions {
  storage?: boolean;        // Include the w3 CLI checks (default true)
  env?: NodeJS.ProcessEnv;
}

/**
 * Verify the GitHub token and, optionally, the w3 CLI and its login.
 * No GitHub request is made; this runs before any network work.
 */
export async function checkCredentials(options: CredentialCheckOptions = {}): Promise<CredentialReport> {
  const checks: CredentialCheck[] = [];

  const token = stateManager.getGitHubToken(options.env);
  checks.push(
    token
      ? { name: 'GitHub token', ok: true, detail: `${GITHUB_TOKEN_ENV} is set` }
      : {
          name: 'GitHub token',
          ok: false,
          detail: `${GITHUB_TOKEN_ENV} is not set`,
          fix: [`export ${GITHUB_TOKEN_ENV}="your-github-api-token"`],
        }
  );

  if (options.storage ?? true) {
    const installed = await storagePublisher.isInstalled();
    checks.push(
      installed
        ? { name: 'w3 CLI', ok: true, detail: 'installed' }
        : {
            name: 'w3 CLI',
            ok: false,
            detail: 'not found in PATH',
            fix: [`npm i --global ${W3_PACKAGE}`],
          }
    );

    if (installed) {
      const login = await storagePublisher.getLoginStatus();
      const ready = login.loggedIn && login.hasSpace;
      checks.push(
        ready
          ? { name: 'web3.storage login', ok: true, detail: login.did ?? 'logged in' }
          : {
              name: 'web3.storage login',
              ok: false,
              detail: login.loggedIn ? 'no space found' : 'not logged in',
              fix: [
                'w3 login --email your.email@example.com',
                'Click the verification link sent to your email',
                'w3 space create my-model-space',
                'w3 space use my-model-space',
              ],
            }
      );
    }
  }

  return { ok: checks.every((check) => check.ok), checks };
}

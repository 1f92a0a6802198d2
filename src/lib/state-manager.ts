import { GlobalConfig, DEFAULT_GLOBAL_CONFIG, GITHUB_TOKEN_ENV, RepositoryRef } from '../types/global-config';
import {
  ensureDir,
  writeJsonAtomic,
  readJson,
  fileExists,
  getConfigDir,
  getGlobalConfigPath,
} from '../utils/file-utils';

export class StateManager {
  private configDir: string;
  private globalConfigPath: string;

  constructor(configDir?: string, globalConfigPath?: string) {
    this.configDir = configDir ?? getConfigDir();
    this.globalConfigPath = globalConfigPath ?? getGlobalConfigPath();
  }

  /**
   * Initialize config directory and default config file
   */
  async initialize(): Promise<void> {
    await ensureDir(this.configDir);

    if (!(await fileExists(this.globalConfigPath))) {
      await this.saveGlobalConfig(DEFAULT_GLOBAL_CONFIG);
    }
  }

  /**
   * Load global configuration
   * Missing keys (older config files) fall back to the defaults
   */
  async loadGlobalConfig(): Promise<GlobalConfig> {
    await this.initialize();
    const stored = await readJson<Partial<GlobalConfig>>(this.globalConfigPath);

    return {
      ...DEFAULT_GLOBAL_CONFIG,
      ...stored,
      repository: { ...DEFAULT_GLOBAL_CONFIG.repository, ...stored.repository },
      forkRetry: { ...DEFAULT_GLOBAL_CONFIG.forkRetry, ...stored.forkRetry },
    };
  }

  /**
   * Save global configuration
   */
  async saveGlobalConfig(config: GlobalConfig): Promise<void> {
    await ensureDir(this.configDir);
    await writeJsonAtomic(this.globalConfigPath, config);
  }

  /**
   * Update global configuration with partial changes
   */
  async updateGlobalConfig(updates: Partial<GlobalConfig>): Promise<GlobalConfig> {
    const existing = await this.loadGlobalConfig();
    const updated = { ...existing, ...updates };
    await this.saveGlobalConfig(updated);
    return updated;
  }

  /**
   * Point submissions at another catalog repository
   */
  async setRepository(repository: Partial<RepositoryRef>): Promise<GlobalConfig> {
    const existing = await this.loadGlobalConfig();
    return this.updateGlobalConfig({
      repository: { ...existing.repository, ...repository },
    });
  }

  /**
   * Restore the default configuration
   */
  async resetGlobalConfig(): Promise<GlobalConfig> {
    await this.saveGlobalConfig(DEFAULT_GLOBAL_CONFIG);
    return DEFAULT_GLOBAL_CONFIG;
  }

  getConfigPath(): string {
    return this.globalConfigPath;
  }

  /**
   * GitHub token from the environment (never stored in the config file)
   */
  getGitHubToken(env: NodeJS.ProcessEnv = process.env): string | null {
    const token = env[GITHUB_TOKEN_ENV]?.trim();
    return token ? token : null;
  }

  /**
   * GitHub token, or an error explaining how to set it
   */
  requireGitHubToken(env: NodeJS.ProcessEnv = process.env): string {
    const token = this.getGitHubToken(env);
    if (!token) {
      throw new Error(
        `${GITHUB_TOKEN_ENV} environment variable is not set.\n\n` +
        `Set it with: export ${GITHUB_TOKEN_ENV}="your-github-api-token"`
      );
    }
    return token;
  }
}

// Export singleton instance
export const stateManager = new StateManager();

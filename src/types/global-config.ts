export interface RepositoryRef {
  owner: string;
  name: string;
  baseBranch: string;
}

export interface GlobalConfig {
  version: string;
  repository: RepositoryRef;      // Catalog repository pull requests target
  apiBaseUrl: string;             // https://api.github.com
  gatewayUrl: string;             // IPFS gateway prefix used in links
  catalogInForks: boolean;        // Merge model-map.json on the fork path too
  forkRetry: {
    attempts: number;
    delayMs: number;
  };
}

/**
 * Default global configuration
 */
export const DEFAULT_GLOBAL_CONFIG: GlobalConfig = {
  version: '1.0.0',
  repository: {
    owner: 'octofacehub',
    name: 'octofacehub.github.io',
    baseBranch: 'main',
  },
  apiBaseUrl: 'https://api.github.com',
  gatewayUrl: 'https://w3s.link/ipfs',
  catalogInForks: false,
  forkRetry: {
    attempts: 2,
    delayMs: 5000,
  },
};

/**
 * Environment variable holding the GitHub access token
 */
export const GITHUB_TOKEN_ENV = 'GITHUB_API_TOKEN';

/**
 * Parse "owner/name" into its parts
 * Returns null when the string is not in that form
 */
export function parseRepositorySlug(slug: string): { owner: string; name: string } | null {
  const parts = slug.split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    return null;
  }
  return { owner: parts[0], name: parts[1] };
}

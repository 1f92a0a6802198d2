import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface GitHubClientConfig {
  token: string;
  apiBaseUrl: string;
  fetch?: FetchFn;            // Defaults to the global fetch
}

export interface RepoCoordinates {
  owner: string;
  name: string;
}

/**
 * Non-2xx response from the GitHub API, labelled with what was being attempted
 */
export class GitHubApiError extends Error {
  constructor(
    readonly action: string,
    readonly status: number,
    readonly body: string
  ) {
    super(`${action} failed: HTTP ${status}${body ? ` ${body}` : ''}`);
    this.name = 'GitHubApiError';
  }
}

/**
 * Octokit for the configured API host
 */
export function createOctokit(config: GitHubClientConfig): Octokit {
  return new Octokit({
    auth: config.token,
    baseUrl: config.apiBaseUrl.replace(/\/+$/, ''),
    userAgent: 'modelpub',
    request: config.fetch ? { fetch: config.fetch } : undefined,
  });
}

/**
 * HTTP status of an API error, or null for anything without a response (network failures included)
 */
export function statusOf(error: unknown): number | null {
  return error instanceof RequestError && error.response ? error.status : null;
}

/**
 * Body of an API error response as text
 */
export function responseText(error: unknown): string {
  if (!(error instanceof RequestError) || !error.response) {
    return '';
  }
  const data: unknown = error.response.data;
  if (data === undefined || data === null || data === '') return '';
  return typeof data === 'string' ? data : JSON.stringify(data);
}

/**
 * Run an API call, turning an error response into a GitHubApiError for `action`.
 * Network failures propagate unchanged.
 */
export async function githubCall<T>(action: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    const status = statusOf(error);
    if (status === null) {
      throw error;
    }
    throw new GitHubApiError(action, status, responseText(error));
  }
}

/**
 * Like githubCall, but a 404 resolves to null
 */
export async function githubLookup<T>(action: string, call: () => Promise<T>): Promise<T | null> {
  try {
    return await githubCall(action, call);
  } catch (error) {
    if (error instanceof GitHubApiError && error.status === 404) {
      return null;
    }
    throw error;
  }
}

import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import {
  GitHubApiError,
  FetchFn,
  createOctokit,
  githubCall,
  githubLookup,
  responseText,
  statusOf,
} from './github-client';
import { TEST_TOKEN, TEST_API_BASE_URL } from '../../tests/fixtures/model-metadata';

function createFetch(status: number, body: string, contentType = 'application/json; charset=utf-8'): Mock<FetchFn> {
  return vi.fn<FetchFn>().mockImplementation(
    async () => new Response(body, { status, headers: { 'content-type': contentType } })
  );
}

function lastCall(fetchFn: Mock<FetchFn>): { url: string; init: RequestInit } {
  const call = fetchFn.mock.calls[fetchFn.mock.calls.length - 1];
  return { url: call[0], init: call[1] ?? {} };
}

describe('createOctokit()', () => {
  it('should send the token and user agent to the configured host', async () => {
    const fetchFn = createFetch(200, '{"login":"alice"}');
    const octokit = createOctokit({ token: TEST_TOKEN, apiBaseUrl: TEST_API_BASE_URL, fetch: fetchFn });

    const { data } = await octokit.users.getAuthenticated();

    const { url, init } = lastCall(fetchFn);
    const headers = new Headers(init.headers);
    expect(url).toBe('https://api.github.test/user');
    expect(headers.get('authorization')).toBe('token test-secret');
    expect(headers.get('user-agent')).toMatch(/^modelpub /);
    expect(data.login).toBe('alice');
  });

  it('should strip trailing slashes from the base URL', async () => {
    const fetchFn = createFetch(200, '{}');
    const octokit = createOctokit({ token: TEST_TOKEN, apiBaseUrl: 'https://api.github.test///', fetch: fetchFn });

    await octokit.repos.get({ owner: 'o', repo: 'n' });

    expect(lastCall(fetchFn).url).toBe('https://api.github.test/repos/o/n');
  });
});

describe('githubCall()', () => {
  it('should label an error response with the action', async () => {
    const octokit = createOctokit({
      token: TEST_TOKEN,
      apiBaseUrl: TEST_API_BASE_URL,
      fetch: createFetch(404, '{"message":"Not Found"}'),
    });

    const error = await githubCall('Get o/n', () => octokit.repos.get({ owner: 'o', repo: 'n' })).catch(
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(GitHubApiError);
    expect(error).toMatchObject({
      message: 'Get o/n failed: HTTP 404 {"message":"Not Found"}',
      status: 404,
      body: '{"message":"Not Found"}',
    });
  });

  it('should keep plain-text bodies as they are', async () => {
    const octokit = createOctokit({
      token: TEST_TOKEN,
      apiBaseUrl: TEST_API_BASE_URL,
      fetch: createFetch(502, 'Bad Gateway', 'text/plain; charset=utf-8'),
    });

    await expect(githubCall('Get authenticated user', () => octokit.users.getAuthenticated())).rejects.toThrow(
      'Get authenticated user failed: HTTP 502 Bad Gateway'
    );
  });

  it('should not turn network failures into API errors', async () => {
    const octokit = createOctokit({
      token: TEST_TOKEN,
      apiBaseUrl: TEST_API_BASE_URL,
      fetch: vi.fn<FetchFn>().mockRejectedValue(new TypeError('fetch failed')),
    });

    const error = await githubCall('Get authenticated user', () => octokit.users.getAuthenticated()).catch(
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(Error);
    expect(error).not.toBeInstanceOf(GitHubApiError);
    expect(statusOf(error)).toBeNull();
  });
});

describe('githubLookup()', () => {
  it('should resolve a 404 to null', async () => {
    const octokit = createOctokit({
      token: TEST_TOKEN,
      apiBaseUrl: TEST_API_BASE_URL,
      fetch: createFetch(404, '{"message":"Branch not found"}'),
    });

    await expect(
      githubLookup('Check branch feature', () => octokit.repos.getBranch({ owner: 'o', repo: 'n', branch: 'feature' }))
    ).resolves.toBeNull();
  });

  it('should throw other error responses', async () => {
    const octokit = createOctokit({
      token: TEST_TOKEN,
      apiBaseUrl: TEST_API_BASE_URL,
      fetch: createFetch(500, '{"message":"Server Error"}'),
    });

    await expect(
      githubLookup('Check branch feature', () => octokit.repos.getBranch({ owner: 'o', repo: 'n', branch: 'feature' }))
    ).rejects.toThrow('Check branch feature failed: HTTP 500 {"message":"Server Error"}');
  });
});

describe('statusOf() and responseText()', () => {
  it('should treat errors without a response as having no status', () => {
    expect(statusOf(new Error('boom'))).toBeNull();
    expect(responseText(new Error('boom'))).toBe('');
  });
});

describe('GitHubApiError', () => {
  it('should include the action, status and body in the message', () => {
    const error = new GitHubApiError('Create pull request', 422, 'Validation Failed');
    expect(error.message).toBe('Create pull request failed: HTTP 422 Validation Failed');
    expect(error.status).toBe(422);
  });

  it('should omit an empty body', () => {
    expect(new GitHubApiError('Fork o/n', 500, '').message).toBe('Fork o/n failed: HTTP 500');
  });
});

import type { FetchFn } from '../../src/lib/github-client';

export interface RecordedRequest {
  method: string;
  path: string;               // Decoded pathname, without the query string
  query: string;
  headers: Headers;
  body: unknown;
}

export interface FakeRepoOptions {
  push?: boolean;
  admin?: boolean;
  branches?: string[];        // Default: ['main']; [] = empty repository
}

interface FakeFile {
  content: string;
  sha: string;
  oversized: boolean;         // Served without inline content, like files over 1 MB
}

interface FakeRepo {
  owner: string;
  name: string;
  permissions: { push: boolean; admin: boolean };
  branches: Map<string, string>;                 // branch -> head sha
  files: Map<string, Map<string, FakeFile>>;     // branch -> path -> file
  pendingRefLookups: number;                     // 404s served before a fresh fork is ready
}

interface Failure {
  method: string;
  pattern: RegExp;
  status: number;
  body: string;
  accept: string | null;
  remaining: number;
}

interface FakeResponseBody {
  status: number;
  json?: unknown;
  raw?: string;
}

const DEFAULT_BRANCH = 'main';
const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';

function contentTypeOf(body: string): string {
  try {
    JSON.parse(body);
    return JSON_CONTENT_TYPE;
  } catch {
    return 'text/plain; charset=utf-8';
  }
}

function readBodyField(body: unknown, key: string): string | undefined {
  if (typeof body !== 'object' || body === null) return undefined;
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * In-process stand-in for the GitHub REST v3 endpoints the publisher calls.
 * Keeps repositories, branches and file revisions in memory and records every request.
 */
export class FakeGitHub {
  readonly requests: RecordedRequest[] = [];
  private repos = new Map<string, FakeRepo>();
  private failures: Failure[] = [];
  private shaCounter = 0;
  private pullCounter = 0;
  forkDelay = 0;

  constructor(readonly login: string) {}

  addRepo(owner: string, name: string, options: FakeRepoOptions = {}): void {
    const repo: FakeRepo = {
      owner,
      name,
      permissions: { push: options.push ?? false, admin: options.admin ?? false },
      branches: new Map(),
      files: new Map(),
      pendingRefLookups: 0,
    };
    for (const branch of options.branches ?? [DEFAULT_BRANCH]) {
      repo.branches.set(branch, this.nextSha());
      repo.files.set(branch, new Map());
    }
    this.repos.set(`${owner}/${name}`, repo);
  }

  hasRepo(owner: string, name: string): boolean {
    return this.repos.has(`${owner}/${name}`);
  }

  hasBranch(owner: string, name: string, branch: string): boolean {
    return this.repos.get(`${owner}/${name}`)?.branches.has(branch) ?? false;
  }

  setFile(
    owner: string,
    name: string,
    branch: string,
    filePath: string,
    content: string,
    options: { oversized?: boolean } = {}
  ): void {
    const repo = this.requireRepo(owner, name);
    const files = repo.files.get(branch);
    if (!files) {
      throw new Error(`No branch ${branch} in ${owner}/${name}`);
    }
    files.set(filePath, { content, sha: this.nextSha(), oversized: options.oversized ?? false });
  }

  getFile(owner: string, name: string, branch: string, filePath: string): string | undefined {
    return this.repos.get(`${owner}/${name}`)?.files.get(branch)?.get(filePath)?.content;
  }

  /**
   * Answer requests matching `method` and `pattern` (tested against the decoded path) with `status`.
   * `accept` narrows the match to requests whose Accept header contains it.
   */
  fail(
    method: string,
    pattern: RegExp,
    status: number,
    options: { body?: string; times?: number; accept?: string } = {}
  ): void {
    this.failures.push({
      method,
      pattern,
      status,
      body: options.body ?? JSON.stringify({ message: 'Injected failure' }),
      accept: options.accept ?? null,
      remaining: options.times ?? Number.POSITIVE_INFINITY,
    });
  }

  requestsTo(method: string, pattern: RegExp): RecordedRequest[] {
    return this.requests.filter((request) => request.method === method && pattern.test(request.path));
  }

  readonly fetch: FetchFn = async (input, init) => {
    const url = new URL(input);
    const method = init?.method ?? 'GET';
    const raw = init?.body;
    const body: unknown = typeof raw === 'string' ? JSON.parse(raw) : null;
    const segments = url.pathname.split('/').filter(Boolean).map(decodeURIComponent);
    const request: RecordedRequest = {
      method,
      path: `/${segments.join('/')}`,
      query: url.search,
      headers: new Headers(init?.headers),
      body,
    };
    this.requests.push(request);

    const accept = request.headers.get('accept') ?? '';
    const failure = this.failures.find(
      (candidate) =>
        candidate.remaining > 0 &&
        candidate.method === method &&
        candidate.pattern.test(request.path) &&
        (candidate.accept === null || accept.includes(candidate.accept))
    );
    if (failure) {
      failure.remaining -= 1;
      return new Response(failure.body, { status: failure.status, headers: { 'content-type': contentTypeOf(failure.body) } });
    }

    const result = this.route(method, segments, url.searchParams, body, accept.includes('.raw'));
    if (result.raw !== undefined) {
      return new Response(result.raw, { status: result.status, headers: { 'content-type': 'text/plain; charset=utf-8' } });
    }
    const text = result.json === undefined ? '' : JSON.stringify(result.json);
    return new Response(text, { status: result.status, headers: { 'content-type': JSON_CONTENT_TYPE } });
  };

  private route(
    method: string,
    segments: string[],
    query: URLSearchParams,
    body: unknown,
    raw: boolean
  ): FakeResponseBody {
    if (segments[0] === 'user' && segments.length === 1 && method === 'GET') {
      return { status: 200, json: { login: this.login } };
    }

    if (segments[0] !== 'repos' || segments.length < 3) {
      return { status: 404, json: { message: 'Not Found' } };
    }

    const [, owner, name, resource, ...rest] = segments;
    const repo = this.repos.get(`${owner}/${name}`);

    if (resource === undefined && method === 'GET') {
      if (!repo) return { status: 404, json: { message: 'Not Found' } };
      return {
        status: 200,
        json: {
          name: repo.name,
          owner: { login: repo.owner },
          html_url: `https://github.test/${repo.owner}/${repo.name}`,
          permissions: repo.permissions,
        },
      };
    }

    if (!repo) {
      return { status: 404, json: { message: 'Not Found' } };
    }

    if (resource === 'branches' && method === 'GET') {
      const sha = repo.branches.get(rest.join('/'));
      return sha
        ? { status: 200, json: { name: rest.join('/'), commit: { sha } } }
        : { status: 404, json: { message: 'Branch not found' } };
    }

    if (resource === 'git' && rest[0] === 'ref' && method === 'GET') {
      if (repo.pendingRefLookups > 0) {
        repo.pendingRefLookups -= 1;
        return { status: 404, json: { message: 'Not Found' } };
      }
      const branch = rest.slice(1).join('/').replace(/^heads\//, '');
      const sha = repo.branches.get(branch);
      return sha
        ? { status: 200, json: { ref: `refs/heads/${branch}`, object: { sha, type: 'commit' } } }
        : { status: 404, json: { message: 'Not Found' } };
    }

    if (resource === 'git' && rest[0] === 'refs' && rest.length === 1 && method === 'POST') {
      return this.createRef(repo, body);
    }

    if (resource === 'contents' && method === 'GET') {
      const branch = query.get('ref') ?? DEFAULT_BRANCH;
      const filePath = rest.join('/');
      const file = repo.files.get(branch)?.get(filePath);
      if (!file) {
        return { status: 404, json: { message: 'Not Found' } };
      }
      if (raw) {
        return { status: 200, raw: file.content };
      }
      return {
        status: 200,
        json: {
          type: 'file',
          path: filePath,
          sha: file.sha,
          encoding: file.oversized ? 'none' : 'base64',
          content: file.oversized ? '' : Buffer.from(file.content, 'utf-8').toString('base64'),
        },
      };
    }

    if (resource === 'contents' && method === 'PUT') {
      return this.putContents(repo, rest.join('/'), body);
    }

    if (resource === 'forks' && method === 'POST') {
      return this.createFork(repo);
    }

    if (resource === 'pulls' && method === 'POST') {
      this.pullCounter += 1;
      return {
        status: 201,
        json: {
          number: this.pullCounter,
          html_url: `https://github.test/${repo.owner}/${repo.name}/pull/${this.pullCounter}`,
        },
      };
    }

    return { status: 404, json: { message: 'Not Found' } };
  }

  private createRef(repo: FakeRepo, body: unknown): FakeResponseBody {
    const ref = readBodyField(body, 'ref') ?? '';
    const sha = readBodyField(body, 'sha');
    const branch = ref.replace(/^refs\/heads\//, '');

    if (repo.branches.has(branch)) {
      return { status: 422, json: { message: 'Reference already exists' } };
    }
    if (!sha) {
      return { status: 422, json: { message: 'Invalid request' } };
    }

    const baseBranch = [...repo.branches.entries()].find(([, head]) => head === sha)?.[0];
    repo.branches.set(branch, sha);
    repo.files.set(branch, new Map(baseBranch ? repo.files.get(baseBranch) : undefined));
    return { status: 201, json: { ref, object: { sha } } };
  }

  private putContents(repo: FakeRepo, filePath: string, body: unknown): FakeResponseBody {
    const branch = readBodyField(body, 'branch') ?? DEFAULT_BRANCH;
    const encoded = readBodyField(body, 'content') ?? '';
    const sha = readBodyField(body, 'sha');

    // The first commit of an empty repository creates the default branch
    if (!repo.branches.has(branch)) {
      if (repo.branches.size > 0 || branch !== DEFAULT_BRANCH) {
        return { status: 404, json: { message: `Branch ${branch} not found` } };
      }
      repo.branches.set(branch, this.nextSha());
      repo.files.set(branch, new Map());
    }

    const files = repo.files.get(branch) ?? new Map<string, FakeFile>();
    const existing = files.get(filePath);
    if (existing && existing.sha !== sha) {
      return sha
        ? { status: 409, json: { message: `${filePath} does not match ${sha}` } }
        : { status: 422, json: { message: '"sha" wasn\'t supplied.' } };
    }

    const file: FakeFile = {
      content: Buffer.from(encoded, 'base64').toString('utf-8'),
      sha: this.nextSha(),
      oversized: existing?.oversized ?? false,
    };
    files.set(filePath, file);
    repo.files.set(branch, files);
    repo.branches.set(branch, this.nextSha());

    return { status: existing ? 200 : 201, json: { content: { path: filePath, sha: file.sha } } };
  }

  private createFork(upstream: FakeRepo): FakeResponseBody {
    const key = `${this.login}/${upstream.name}`;
    if (!this.repos.has(key)) {
      const fork: FakeRepo = {
        owner: this.login,
        name: upstream.name,
        permissions: { push: true, admin: true },
        branches: new Map(upstream.branches),
        files: new Map([...upstream.files.entries()].map(([branch, files]) => [branch, new Map(files)])),
        pendingRefLookups: this.forkDelay,
      };
      this.repos.set(key, fork);
    }
    return {
      status: 202,
      json: {
        name: upstream.name,
        owner: { login: this.login },
        html_url: `https://github.test/${key}`,
      },
    };
  }

  private requireRepo(owner: string, name: string): FakeRepo {
    const repo = this.repos.get(`${owner}/${name}`);
    if (!repo) {
      throw new Error(`No repository ${owner}/${name}`);
    }
    return repo;
  }

  private nextSha(): string {
    this.shaCounter += 1;
    return `sha${String(this.shaCounter).padStart(6, '0')}`;
  }
}

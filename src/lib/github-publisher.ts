import { Octokit } from '@octokit/rest';
import { GlobalConfig, RepositoryRef } from '../types/global-config';
import { ModelMetadata, ModelSubmission, ModelTreeEntry } from '../types/model-metadata';
import {
  GitHubApiError,
  RepoCoordinates,
  createOctokit,
  githubCall,
  githubLookup,
  responseText,
  statusOf,
} from './github-client';
import { CATALOG_PATH, MergeResult, emptyCatalog, mergeCatalogEntry, parseCatalog, serializeCatalog, toCatalogEntry } from './catalog';
import { ModelPackager, modelPackager } from './model-packager';
import { Reporter, consoleReporter } from './reporter';
import { withRetry, sleep } from '../utils/retry-utils';
import { modelRepoPath, submissionBranchName, unixSeconds } from '../utils/naming-utils';

/**
 * Outcome of the push-permission check
 */
export type AccessLevel =
  | { kind: 'authorized' }
  | { kind: 'unauthorized' }
  | { kind: 'transport-error'; detail: string };

/**
 * Outcome of `test-github`: token works and the repository is visible
 */
export type AccessCheck =
  | { ok: true; login: string; repository: string }
  | { ok: false; stage: 'user' | 'repository'; error: Error };

export type PublishStrategy = 'direct-push' | 'fork';

export type PublishStep =
  | 'identify-user'
  | 'initialize-repository'
  | 'fork'
  | 'create-branch'
  | 'write-files'
  | 'update-catalog'
  | 'open-pull-request';

export type PublishResult =
  | {
      status: 'published';
      strategy: PublishStrategy;
      prUrl: string;
      branch: string;
      head: string;
      files: string[];
      catalog: MergeResult | null;      // null when the catalog was not touched
    }
  | {
      status: 'failed';
      strategy: PublishStrategy | null;  // null when failing before selection
      step: PublishStep;
      error: Error;
    };

export interface RetrySettings {
  attempts: number;
  delayMs: number;
}

export interface GitHubPublisherOptions {
  octokit: Octokit;
  target: RepositoryRef;
  gatewayUrl: string;
  catalogInForks?: boolean;
  forkRetry?: RetrySettings;
  reporter?: Reporter;
  packager?: ModelPackager;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

interface RepoFile {
  path: string;
  content: string;
  message: string;
}

interface RemoteFile {
  sha: string;
  content: string;
  encoding: string;
}

class PublishStepError extends Error {
  constructor(readonly step: PublishStep, readonly reason: Error) {
    super(reason.message);
    this.name = 'PublishStepError';
  }
}

const DEFAULT_FORK_RETRY: RetrySettings = { attempts: 2, delayMs: 5000 };

const INITIAL_README = `# Model Catalog

A catalog of IPFS-hosted machine-learning models.

## Contributing

Models are added through pull requests opened by the \`modelpub\` CLI:

\`\`\`bash
modelpub upload /path/to/model --name "My Model" --description "A description" --tags "tag1,tag2"
\`\`\`
`;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function encodeContent(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64');
}

/**
 * Publishes a model submission to the catalog repository as a pull request.
 *
 * With push access the branch lives in the catalog repository itself and the
 * shared model map is updated on it. Without push access the submission goes
 * through the caller's fork; the model map is left alone there (unless
 * `catalogInForks` is set) because the fork's copy may predate entries merged
 * upstream since the fork was made.
 *
 * Files are written one commit each. A failure stops the sequence and leaves
 * anything already created (branch, fork, earlier files) in place.
 */
export class GitHubPublisher {
  private octokit: Octokit;
  private target: RepositoryRef;
  private gatewayUrl: string;
  private catalogInForks: boolean;
  private forkRetry: RetrySettings;
  private reporter: Reporter;
  private packager: ModelPackager;
  private now: () => Date;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: GitHubPublisherOptions) {
    this.octokit = options.octokit;
    this.target = options.target;
    this.gatewayUrl = options.gatewayUrl;
    this.catalogInForks = options.catalogInForks ?? false;
    this.forkRetry = options.forkRetry ?? DEFAULT_FORK_RETRY;
    this.reporter = options.reporter ?? consoleReporter;
    this.packager = options.packager ?? modelPackager;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? sleep;
  }

  private get upstream(): RepoCoordinates {
    return { owner: this.target.owner, name: this.target.name };
  }

  private get upstreamLabel(): string {
    return `${this.target.owner}/${this.target.name}`;
  }

  /**
   * Login of the token's owner
   */
  async getUsername(): Promise<string> {
    const { data } = await githubCall('Get authenticated user', () => this.octokit.users.getAuthenticated());
    return data.login;
  }

  /**
   * Whether the token may push to the catalog repository
   */
  async resolveAccess(): Promise<AccessLevel> {
    try {
      const { data } = await this.octokit.repos.get({ owner: this.target.owner, repo: this.target.name });
      const canPush = data.permissions?.push === true || data.permissions?.admin === true;
      return canPush ? { kind: 'authorized' } : { kind: 'unauthorized' };
    } catch (error) {
      const status = statusOf(error);
      const detail = status === null ? toError(error).message : `HTTP ${status} ${responseText(error)}`.trim();
      return { kind: 'transport-error', detail };
    }
  }

  /**
   * Confirm the token authenticates and the catalog repository is readable
   */
  async verifyAccess(): Promise<AccessCheck> {
    let login: string;
    try {
      login = await this.getUsername();
    } catch (error) {
      return { ok: false, stage: 'user', error: toError(error) };
    }

    try {
      await githubCall(`Access ${this.upstreamLabel}`, () =>
        this.octokit.repos.get({ owner: this.target.owner, repo: this.target.name })
      );
      return { ok: true, login, repository: this.upstreamLabel };
    } catch (error) {
      return { ok: false, stage: 'repository', error: toError(error) };
    }
  }

  /**
   * Make sure the base branch exists, bootstrapping an initial commit on an empty repository
   * Returns true when an initial commit was created
   */
  async ensureRepositoryInitialized(): Promise<boolean> {
    const base = this.target.baseBranch;
    const branch = await githubLookup(`Check branch ${base}`, () =>
      this.octokit.repos.getBranch({ owner: this.target.owner, repo: this.target.name, branch: base })
    );
    if (branch) {
      return false;
    }

    this.reporter.warn('Repository is empty. Creating initial commit...');
    await githubCall('Create initial commit', () =>
      this.octokit.repos.createOrUpdateFileContents({
        owner: this.target.owner,
        repo: this.target.name,
        path: 'README.md',
        message: 'Initial commit',
        content: encodeContent(INITIAL_README),
      })
    );
    this.reporter.success('Created initial commit');
    return true;
  }

  /**
   * Create `branch` from `base` in a repository.
   * An existing branch of that name counts as success. With `retry`, the base
   * lookup is repeated while the base branch is not yet visible (fresh forks).
   */
  async createBranch(repo: RepoCoordinates, branch: string, base: string, retry?: RetrySettings): Promise<void> {
    if (await this.branchExists(repo, branch)) {
      this.reporter.warn(`Branch ${branch} already exists, reusing it.`);
      return;
    }

    const baseAction = `Get ${base} of ${repo.owner}/${repo.name}`;
    const baseRef = await withRetry(
      () => githubLookup(baseAction, () => this.octokit.git.getRef({ owner: repo.owner, repo: repo.name, ref: `heads/${base}` })),
      {
        attempts: retry?.attempts ?? 1,
        delayMs: retry?.delayMs ?? 0,
        shouldRetry: (ref) => ref === null,
        onRetry: () => this.reporter.warn(`Waiting for ${repo.owner}/${repo.name} to be ready...`),
        sleep: this.sleep,
      }
    );
    if (!baseRef) {
      throw new GitHubApiError(baseAction, 404, '');
    }

    try {
      await githubCall(`Create branch ${branch}`, () =>
        this.octokit.git.createRef({
          owner: repo.owner,
          repo: repo.name,
          ref: `refs/heads/${branch}`,
          sha: baseRef.data.object.sha,
        })
      );
    } catch (error) {
      // GitHub also answers 422 for an invalid ref name; only a branch that now exists means a lost race
      const conflict = error instanceof GitHubApiError && (error.status === 409 || error.status === 422);
      if (!conflict || !(await this.branchExists(repo, branch))) {
        throw error;
      }
      this.reporter.warn(`Branch ${branch} already exists, reusing it.`);
      return;
    }
    this.reporter.success(`Created branch: ${branch}`);
  }

  /**
   * Create or update a file on a branch.
   * An existing file is replaced using its current SHA; a concurrent change in
   * between makes the write fail.
   */
  async writeFile(repo: RepoCoordinates, file: RepoFile, branch: string): Promise<void> {
    const current = await this.getFile(repo, file.path, branch);
    const sha = current?.sha;

    await githubCall(`Write ${file.path}`, () =>
      this.octokit.repos.createOrUpdateFileContents({
        owner: repo.owner,
        repo: repo.name,
        path: file.path,
        message: file.message,
        content: encodeContent(file.content),
        branch,
        sha,
      })
    );
    this.reporter.success(`${sha ? 'Updated' : 'Created'} ${file.path}`);
  }

  /**
   * Insert or replace the model's entry in the shared model map on a branch
   */
  async updateCatalog(repo: RepoCoordinates, metadata: ModelMetadata, entryPath: string, branch: string): Promise<MergeResult> {
    const current = await this.getFile(repo, CATALOG_PATH, branch);
    let catalog = emptyCatalog();

    if (current) {
      // Files over 1 MB come back without inline content
      const text = current.encoding === 'base64'
        ? Buffer.from(current.content, 'base64').toString('utf-8')
        : await this.readRawFile(repo, CATALOG_PATH, branch);
      const parsed = parseCatalog(text);
      if (parsed.problem) {
        this.reporter.warn(`Warning: ${parsed.problem}; starting from an empty model map`);
      }
      catalog = parsed.catalog;
    }

    const merged = mergeCatalogEntry(catalog, toCatalogEntry(metadata, entryPath));
    await githubCall(`Write ${CATALOG_PATH}`, () =>
      this.octokit.repos.createOrUpdateFileContents({
        owner: repo.owner,
        repo: repo.name,
        path: CATALOG_PATH,
        message: `Update model map with ${metadata.name}`,
        content: encodeContent(serializeCatalog(merged.catalog)),
        branch,
        sha: current?.sha,
      })
    );
    this.reporter.success(`${merged.replaced ? 'Updated' : 'Added'} model map entry: ${entryPath}`);
    return merged;
  }

  /**
   * Find the caller's fork of the catalog repository, creating it if needed
   */
  async getOrCreateFork(login: string): Promise<RepoCoordinates> {
    const existing = await githubLookup(`Get ${login}/${this.target.name}`, () =>
      this.octokit.repos.get({ owner: login, repo: this.target.name })
    );
    if (existing) {
      this.reporter.success(`Using existing fork: ${existing.data.html_url}`);
      return { owner: existing.data.owner.login, name: existing.data.name };
    }

    this.reporter.warn('Creating a new fork...');
    const { data } = await githubCall(`Fork ${this.upstreamLabel}`, () =>
      this.octokit.repos.createFork({ owner: this.target.owner, repo: this.target.name })
    );
    this.reporter.success(`Fork created: ${data.html_url}`);
    return { owner: data.owner.login, name: data.name };
  }

  /**
   * Open the pull request against the catalog repository's base branch
   */
  async openPullRequest(head: string, title: string, body: string): Promise<string> {
    const { data } = await githubCall('Create pull request', () =>
      this.octokit.pulls.create({
        owner: this.target.owner,
        repo: this.target.name,
        title,
        body,
        head,
        base: this.target.baseBranch,
      })
    );
    return data.html_url;
  }

  private async branchExists(repo: RepoCoordinates, branch: string): Promise<boolean> {
    const found = await githubLookup(`Check branch ${branch}`, () =>
      this.octokit.repos.getBranch({ owner: repo.owner, repo: repo.name, branch })
    );
    return found !== null;
  }

  /**
   * Current revision of a file on a branch, or null when it does not exist
   */
  private async getFile(repo: RepoCoordinates, filePath: string, branch: string): Promise<RemoteFile | null> {
    const response = await githubLookup(`Read ${filePath}`, () =>
      this.octokit.repos.getContent({ owner: repo.owner, repo: repo.name, path: filePath, ref: branch })
    );
    if (!response) {
      return null;
    }

    const { data } = response;
    if (Array.isArray(data) || data.type !== 'file') {
      throw new Error(`Expected a file at ${filePath}`);
    }
    return { sha: data.sha, content: data.content, encoding: data.encoding };
  }

  private async readRawFile(repo: RepoCoordinates, filePath: string, branch: string): Promise<string> {
    const response = await githubCall(`Read ${filePath}`, () =>
      this.octokit.repos.getContent({
        owner: repo.owner,
        repo: repo.name,
        path: filePath,
        ref: branch,
        mediaType: { format: 'raw' },
      })
    );
    const raw: unknown = response.data;
    if (typeof raw !== 'string') {
      throw new Error(`Could not read ${filePath} as raw text`);
    }
    return raw;
  }

  /**
   * Run the whole submission: identify, choose a strategy, branch, write, open the PR
   */
  async publish(submission: ModelSubmission): Promise<PublishResult> {
    let strategy: PublishStrategy | null = null;

    try {
      const login = await this.step('identify-user', () => this.getUsername());

      const access = await this.resolveAccess();
      if (access.kind === 'transport-error') {
        this.reporter.warn(`Could not determine push access (${access.detail}); using the fork workflow`);
      }
      strategy = access.kind === 'authorized' ? 'direct-push' : 'fork';

      const startedAt = this.now();
      const branch = submissionBranchName(submission.name, unixSeconds(startedAt));
      const { metadata, tree } = await this.prepare(submission, login, startedAt);
      const modelDir = modelRepoPath(login, submission.name);

      const readme: RepoFile = {
        path: `${modelDir}/README.md`,
        content: this.packager.generateReadme(metadata, this.gatewayUrl),
        message: `Add README for ${submission.name}`,
      };
      const metadataFile: RepoFile = {
        path: `${modelDir}/metadata.json`,
        content: JSON.stringify(metadata, null, 2),
        message: `Add metadata for ${submission.name}`,
      };
      const treeFile: RepoFile = {
        path: `${modelDir}/tree.json`,
        content: JSON.stringify(tree, null, 2),
        message: `Add file tree for ${submission.name}`,
      };

      const working = strategy === 'direct-push'
        ? await this.startDirectPush(branch)
        : await this.startFork(login, branch);
      const files = strategy === 'direct-push' ? [readme, metadataFile, treeFile] : [readme, metadataFile];
      const mergeCatalog = strategy === 'direct-push' || this.catalogInForks;

      await this.step('write-files', async () => {
        for (const file of files) {
          await this.writeFile(working.repo, file, branch);
        }
      });

      const catalog = mergeCatalog
        ? await this.step('update-catalog', () => this.updateCatalog(working.repo, metadata, modelDir, branch))
        : null;

      const prUrl = await this.step('open-pull-request', () =>
        this.openPullRequest(working.head, `Add model: ${submission.name}`, this.pullRequestBody(submission, login))
      );
      this.reporter.success(`Created pull request: ${prUrl}`);

      return {
        status: 'published',
        strategy,
        prUrl,
        branch,
        head: working.head,
        files: [...files.map((file) => file.path), ...(catalog ? [CATALOG_PATH] : [])],
        catalog,
      };
    } catch (error) {
      if (!(error instanceof PublishStepError)) {
        throw error;
      }

      this.reporter.error(`Step "${error.step}" failed: ${error.reason.message}`);
      if (error.reason instanceof GitHubApiError && error.reason.body) {
        this.reporter.detail(`Response: ${error.reason.body}`);
      }
      return { status: 'failed', strategy, step: error.step, error: error.reason };
    }
  }

  private async startDirectPush(branch: string): Promise<{ repo: RepoCoordinates; head: string }> {
    this.reporter.info(`Direct push to ${this.target.owner}/${this.target.name}`);
    await this.step('initialize-repository', () => this.ensureRepositoryInitialized());
    await this.step('create-branch', () => this.createBranch(this.upstream, branch, this.target.baseBranch));
    return { repo: this.upstream, head: branch };
  }

  private async startFork(login: string, branch: string): Promise<{ repo: RepoCoordinates; head: string }> {
    this.reporter.warn("You don't have push access to the catalog repository.");
    this.reporter.warn('Creating a fork and PR on your behalf...');
    const fork = await this.step('fork', () => this.getOrCreateFork(login));
    await this.step('create-branch', () =>
      this.createBranch(fork, branch, this.target.baseBranch, this.forkRetry)
    );
    return { repo: fork, head: `${fork.owner}:${branch}` };
  }

  private async prepare(
    submission: ModelSubmission,
    author: string,
    createdAt: Date
  ): Promise<{ metadata: ModelMetadata; tree: ModelTreeEntry[] }> {
    let tree: ModelTreeEntry[] = [];
    let sizeMb = 0;

    if (submission.modelPath) {
      try {
        const packaged = await this.packager.packageDirectory(submission.modelPath);
        tree = packaged.tree;
        sizeMb = packaged.sizeMb;
      } catch (error) {
        this.reporter.warn(`Warning: Could not calculate model size: ${toError(error).message}`);
      }
    }

    const metadata = this.packager.buildMetadata({
      name: submission.name,
      description: submission.description,
      author,
      tags: submission.tags,
      cid: submission.cid,
      sizeMb,
      createdAt,
    });

    return { metadata, tree };
  }

  private pullRequestBody(submission: ModelSubmission, login: string): string {
    return (
      `This PR adds the ${submission.name} model by @${login}.\n\n` +
      `Model description: ${submission.description || 'No description provided'}\n\n` +
      `IPFS CID: \`${submission.cid}\``
    );
  }

  private async step<T>(step: PublishStep, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new PublishStepError(step, toError(error));
    }
  }
}

/**
 * Publisher for the configured catalog repository
 */
export function createGitHubPublisher(config: GlobalConfig, token: string, reporter: Reporter = consoleReporter): GitHubPublisher {
  return new GitHubPublisher({
    octokit: createOctokit({ token, apiBaseUrl: config.apiBaseUrl }),
    target: config.repository,
    gatewayUrl: config.gatewayUrl,
    catalogInForks: config.catalogInForks,
    forkRetry: config.forkRetry,
    reporter,
  });
}

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { generateFilesCommand } from './generate-files';
import { stateManager } from '../lib/state-manager';
import { DEFAULT_GLOBAL_CONFIG } from '../types/global-config';

vi.mock('../lib/state-manager', async () => {
  const { createMockStateManager } = await import('../../tests/mocks/state-manager.mock');
  return { stateManager: createMockStateManager() };
});

describe('generateFilesCommand()', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'modelpub-files-'));
    vi.mocked(stateManager.loadGlobalConfig).mockResolvedValue(DEFAULT_GLOBAL_CONFIG);
    vi.mocked(stateManager.getGitHubToken).mockReturnValue(null);
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it('should write the model files and the submission guide', async () => {
    await generateFilesCommand({
      name: 'My Model',
      description: 'A small test model',
      tags: 'llm, test,',
      cid: 'bafytestcid',
      output: outputDir,
    });

    const modelDir = path.join(outputDir, 'anonymous', 'my-model');
    const metadata: unknown = JSON.parse(await fs.readFile(path.join(modelDir, 'metadata.json'), 'utf-8'));
    expect(metadata).toMatchObject({
      name: 'My Model',
      description: 'A small test model',
      author: 'anonymous',
      tags: ['llm', 'test'],
      ipfs_cid: 'bafytestcid',
      size_mb: 0,
    });
    expect(await fs.readFile(path.join(modelDir, 'tree.json'), 'utf-8')).toBe('[]');
    expect(await fs.readFile(path.join(modelDir, 'README.md'), 'utf-8'))
      .toContain('- [View on IPFS Gateway](https://w3s.link/ipfs/bafytestcid)');
    expect(await fs.readFile(path.join(outputDir, 'GUIDE.md'), 'utf-8'))
      .toContain('# How to Add Your Model to octofacehub/octofacehub.github.io');
  });

  it('should record the tree of a local model directory', async () => {
    const modelSource = path.join(outputDir, 'source');
    await fs.mkdir(modelSource);
    await fs.writeFile(path.join(modelSource, 'weights.bin'), Buffer.alloc(2048));

    await generateFilesCommand({
      path: modelSource,
      name: 'Tiny',
      description: 'Tiny model',
      tags: 'test',
      cid: 'bafytestcid',
      output: path.join(outputDir, 'out'),
    });

    const tree: unknown = JSON.parse(
      await fs.readFile(path.join(outputDir, 'out', 'anonymous', 'tiny', 'tree.json'), 'utf-8')
    );
    expect(tree).toEqual([{ path: 'weights.bin', size: 2048 }]);
  });

  it('should require a path or a CID', async () => {
    await expect(generateFilesCommand({
      name: 'My Model',
      description: 'd',
      tags: '',
      output: outputDir,
    })).rejects.toThrow('Either --path or --cid must be provided');
  });

  it('should reject a path that is not a directory', async () => {
    const filePath = path.join(outputDir, 'model.bin');
    await fs.writeFile(filePath, 'x');

    await expect(generateFilesCommand({
      path: filePath,
      name: 'My Model',
      description: 'd',
      tags: '',
      cid: 'bafytestcid',
      output: outputDir,
    })).rejects.toThrow(`Not a directory: ${filePath}`);
  });
});

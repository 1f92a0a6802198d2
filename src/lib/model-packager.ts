import * as fs from 'fs/promises';
import * as path from 'path';
import { ModelMetadata, ModelTreeEntry } from '../types/model-metadata';
import { RepositoryRef } from '../types/global-config';
import { bytesToMegabytes } from '../utils/format-utils';
import { modelSlug, modelRepoPath } from '../utils/naming-utils';

export interface MetadataInput {
  name: string;
  description?: string;
  author: string;
  tags: string[];
  cid: string;
  sizeMb?: number;
  createdAt?: Date;
}

export interface PackagedModel {
  tree: ModelTreeEntry[];
  totalBytes: number;
  sizeMb: number;
}

export class ModelPackager {
  /**
   * List every regular file below a directory, sorted by relative path
   */
  async buildTree(rootDir: string): Promise<ModelTreeEntry[]> {
    const entries: ModelTreeEntry[] = [];

    const walk = async (dir: string): Promise<void> => {
      const dirents = await fs.readdir(dir, { withFileTypes: true });
      for (const dirent of dirents) {
        const fullPath = path.join(dir, dirent.name);
        if (dirent.isDirectory()) {
          await walk(fullPath);
          continue;
        }

        // Follow symlinks to files, as the upload does
        const stats = await fs.stat(fullPath);
        if (stats.isFile()) {
          entries.push({
            path: path.relative(rootDir, fullPath).split(path.sep).join('/'),
            size: stats.size,
          });
        }
      }
    };

    await walk(rootDir);
    return entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  /**
   * Tree and size of a model directory in one walk
   */
  async packageDirectory(rootDir: string): Promise<PackagedModel> {
    const tree = await this.buildTree(rootDir);
    const totalBytes = tree.reduce((sum, entry) => sum + entry.size, 0);
    return { tree, totalBytes, sizeMb: bytesToMegabytes(totalBytes) };
  }

  /**
   * Build the immutable metadata record for a submission
   */
  buildMetadata(input: MetadataInput): ModelMetadata {
    const createdAt = input.createdAt ?? new Date();
    return Object.freeze({
      name: input.name,
      description: input.description ?? '',
      author: input.author,
      tags: Object.freeze([...input.tags]),
      ipfs_cid: input.cid,
      size_mb: input.sizeMb ?? 0,
      created_at: createdAt.toISOString(),
    });
  }

  /**
   * README.md shown for the model in the catalog repository
   */
  generateReadme(metadata: ModelMetadata, gatewayUrl: string): string {
    const tags = metadata.tags.length > 0
      ? metadata.tags.map((tag) => `\`${tag}\``).join(', ')
      : 'None';

    return `# ${metadata.name}

${metadata.description}

## Details

- **Author**: [${metadata.author}](https://github.com/${metadata.author})
- **IPFS CID**: \`${metadata.ipfs_cid}\`

## Tags

${tags}

## How to use

### Download from IPFS

\`\`\`bash
# Install IPFS CLI if needed
npm i --global @web3-storage/w3cli

# Download the model
w3 get ${metadata.ipfs_cid} -o ./models/${modelSlug(metadata.name)}
\`\`\`

## Web links

- [View on IPFS Gateway](${gatewayLink(gatewayUrl, metadata.ipfs_cid)})
`;
  }

  /**
   * Step-by-step guide for submitting generated files by hand
   */
  generateSubmissionGuide(
    metadata: ModelMetadata,
    repository: RepositoryRef,
    gatewayUrl: string,
    filesDir: string
  ): string {
    const slug = modelSlug(metadata.name);
    const repoDir = modelRepoPath(metadata.author, metadata.name);

    return `# How to Add Your Model to ${repository.owner}/${repository.name}

Your model has been uploaded to IPFS with CID: ${metadata.ipfs_cid}
View your model at: ${gatewayLink(gatewayUrl, metadata.ipfs_cid)}

To add your model to the catalog, follow these steps:

1. Fork the catalog repository: https://github.com/${repository.owner}/${repository.name}
2. Clone your fork:
   \`\`\`
   git clone https://github.com/${metadata.author}/${repository.name}.git
   cd ${repository.name}
   \`\`\`
3. Copy the generated files to your cloned repository:
   \`\`\`
   mkdir -p ${repoDir}
   cp -r ${filesDir}/* ${repoDir}/
   \`\`\`
4. Commit and push your changes:
   \`\`\`
   git add ${repoDir}
   git commit -m "Add ${metadata.name} model"
   git push
   \`\`\`
5. Create a pull request from your fork against the \`${repository.baseBranch}\` branch.

The generated files are located at: ${filesDir}
Model slug: ${slug}
`;
  }
}

/**
 * Gateway URL for a content identifier
 * Example: ("https://w3s.link/ipfs/", "bafy...") → "https://w3s.link/ipfs/bafy..."
 */
export function gatewayLink(gatewayUrl: string, cid: string): string {
  return `${gatewayUrl.replace(/\/+$/, '')}/${cid}`;
}

// Export singleton instance
export const modelPackager = new ModelPackager();

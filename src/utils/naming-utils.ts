/**
 * Model slug used in repository paths and branch names
 * Example: "My Model" → "my-model"
 */
export function modelSlug(name: string): string {
  return name.toLowerCase().replace(/ /g, '-');
}

/**
 * Branch name for one submission
 * Example: ("My Model", 1700000000) → "add-model-my-model-1700000000"
 */
export function submissionBranchName(name: string, unixSeconds: number): string {
  return `add-model-${modelSlug(name)}-${unixSeconds}`;
}

/**
 * Directory holding a model's files in the catalog repository
 * Example: ("alice", "My Model") → "models/alice/my-model"
 */
export function modelRepoPath(author: string, name: string): string {
  return `models/${author}/${modelSlug(name)}`;
}

/**
 * Seconds since the epoch for a date
 */
export function unixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

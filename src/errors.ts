/**
 * Git operations a repository handle can fail in.
 */
export type RepoOperation =
  | 'clone'
  | 'fetch'
  | 'checkout'
  | 'pull'
  | 'branch'
  | 'revision'
  | 'history'
  | 'divergence';

/**
 * Base class for every failure reported by a repository handle.
 *
 * The failing git invocation (or validation error) is kept as `cause`.
 *
 * @example
 * ```typescript
 * try {
 *   await repo.sync('release');
 * } catch (error) {
 *   if (error instanceof RepoOperationError) {
 *     console.log(`${error.operation} failed for ${error.repository}`);
 *   }
 * }
 * ```
 */
export class RepoOperationError extends Error {
  readonly operation: RepoOperation;
  readonly repository: string;

  constructor(operation: RepoOperation, repository: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'RepoOperationError';
    this.operation = operation;
    this.repository = repository;
  }
}

export class CloneFailedError extends RepoOperationError {
  constructor(repository: string, cause?: unknown) {
    super('clone', repository, `could not clone repo ${repository}`, cause);
    this.name = 'CloneFailedError';
  }
}

export class FetchFailedError extends RepoOperationError {
  constructor(repository: string, cause?: unknown) {
    super('fetch', repository, `could not fetch repo data for ${repository}`, cause);
    this.name = 'FetchFailedError';
  }
}

export class CheckoutFailedError extends RepoOperationError {
  readonly branch: string;

  constructor(repository: string, branch: string, cause?: unknown) {
    super('checkout', repository, `could not checkout repo branch ${repository}:${branch}`, cause);
    this.name = 'CheckoutFailedError';
    this.branch = branch;
  }
}

export class PullFailedError extends RepoOperationError {
  constructor(repository: string, cause?: unknown) {
    super('pull', repository, `could not pull repo changes for ${repository}`, cause);
    this.name = 'PullFailedError';
  }
}

export class BranchQueryFailedError extends RepoOperationError {
  constructor(repository: string, cause?: unknown) {
    super('branch', repository, `could not get git branch for ${repository}`, cause);
    this.name = 'BranchQueryFailedError';
  }
}

export class RevisionQueryFailedError extends RepoOperationError {
  constructor(repository: string, cause?: unknown) {
    super('revision', repository, `could not get git revision id for ${repository}`, cause);
    this.name = 'RevisionQueryFailedError';
  }
}

export class HistoryQueryFailedError extends RepoOperationError {
  constructor(repository: string, cause?: unknown) {
    super('history', repository, `could not get git revision ids for ${repository}`, cause);
    this.name = 'HistoryQueryFailedError';
  }
}

export class DivergenceQueryFailedError extends RepoOperationError {
  readonly from: string;
  readonly to: string;

  constructor(repository: string, from: string, to: string, cause?: unknown) {
    super('divergence', repository, `could not compare ${from}...${to} in ${repository}`, cause);
    this.name = 'DivergenceQueryFailedError';
    this.from = from;
    this.to = to;
  }
}

export { Repository } from './repository.js';
export { createExecaRunner } from './runner.js';
export { repoName, repoPath, VCS_SUFFIX } from './identity.js';
export { loadConfig } from './config.js';
export {
  RepoOperationError,
  CloneFailedError,
  FetchFailedError,
  CheckoutFailedError,
  PullFailedError,
  BranchQueryFailedError,
  RevisionQueryFailedError,
  HistoryQueryFailedError,
  DivergenceQueryFailedError
} from './errors.js';
export type { RepoOperation } from './errors.js';
export type { SyncConfig } from './config.js';
export type {
  CommandRunner,
  DivergenceResult,
  RepoLogger,
  RepoStatus,
  RepositoryOptions
} from './types.js';

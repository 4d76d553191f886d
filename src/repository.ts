import { join } from 'path';
import fs from 'fs-extra';
import {
  BranchQueryFailedError,
  CheckoutFailedError,
  CloneFailedError,
  DivergenceQueryFailedError,
  FetchFailedError,
  HistoryQueryFailedError,
  PullFailedError,
  RevisionQueryFailedError
} from './errors.js';
import { repoName, repoPath } from './identity.js';
import { createExecaRunner } from './runner.js';
import { ui } from './ui.js';
import { SecurityValidator } from './utils/security.js';
import type {
  CommandRunner,
  DivergenceResult,
  RepoLogger,
  RepoStatus,
  RepositoryOptions
} from './types.js';

/**
 * A local checkout of a remote repository.
 *
 * Handles are created with {@link Repository.clone}, which guarantees the
 * checkout exists. Nothing about git state is cached: every query runs git
 * in the deployment path and reflects what is on disk right now.
 *
 * Operations on one handle are not meant to overlap; await each call
 * before starting the next one against the same deployment path.
 *
 * @example
 * ```typescript
 * const repo = await Repository.clone('git@host:org/proj.git', '/work/');
 * await repo.sync('release');
 * console.log(await repo.commitId());
 * ```
 */
export class Repository {
  readonly remote: string;
  readonly destination: string;
  readonly deploymentPath: string;

  private readonly runner: CommandRunner;
  private readonly gitBinary: string;
  private readonly logger: RepoLogger;

  private constructor(remote: string, destination: string, options: RepositoryOptions) {
    this.remote = remote;
    this.destination = destination;
    this.deploymentPath = join(destination, repoName(remote));
    this.runner = options.runner ?? createExecaRunner();
    this.gitBinary = options.gitBinary ?? 'git';
    this.logger = options.logger ?? ui;
  }

  /**
   * Creates a handle for `remote` under `destination`, cloning it first if
   * nothing exists at the deployment path yet.
   *
   * An existing entry at the deployment path is trusted as-is; it is not
   * checked to be a checkout of `remote`.
   *
   * @throws {CloneFailedError} When the remote is invalid or `git clone` fails
   */
  static async clone(
    remote: string,
    destination: string,
    options: RepositoryOptions = {}
  ): Promise<Repository> {
    const repo = new Repository(remote, destination, options);
    await repo.cloneIfAbsent();
    return repo;
  }

  /** Repository name, e.g. `proj` for `git@host:org/proj.git` */
  name(): string {
    return repoName(this.remote);
  }

  /** Display path, e.g. `org/proj` for `git@host:org/proj.git` */
  path(): string {
    return repoPath(this.remote);
  }

  /**
   * Whether anything exists at the deployment path. Never rejects.
   */
  async exists(): Promise<boolean> {
    return fs.pathExists(this.deploymentPath);
  }

  async fetch(): Promise<void> {
    try {
      await this.git('fetch');
    } catch (error) {
      throw new FetchFailedError(this.name(), error);
    }
  }

  async checkout(branch: string): Promise<void> {
    try {
      SecurityValidator.validateRef(branch);
      await this.git('checkout', branch);
    } catch (error) {
      throw new CheckoutFailedError(this.name(), branch, error);
    }
  }

  async pull(): Promise<void> {
    try {
      await this.git('pull');
    } catch (error) {
      throw new PullFailedError(this.name(), error);
    }
  }

  /**
   * Brings the checkout to the tip of `branch`: fetch, checkout, pull.
   *
   * Stops at the first failing step and rejects with that step's error.
   * Steps that already ran are not undone.
   */
  async sync(branch: string): Promise<void> {
    this.logger.info(`Syncing ${this.name()} to ${branch}`);
    await this.fetch();
    await this.checkout(branch);
    await this.pull();
  }

  /**
   * Current symbolic branch name. A detached HEAD reports `HEAD`.
   */
  async branch(): Promise<string> {
    try {
      const output = await this.git('rev-parse', '--abbrev-ref', 'HEAD');
      return output.trim();
    } catch (error) {
      throw new BranchQueryFailedError(this.name(), error);
    }
  }

  /** Full id of the checked-out revision */
  async commitId(): Promise<string> {
    try {
      const output = await this.git('rev-parse', 'HEAD');
      return output.trim();
    } catch (error) {
      throw new RevisionQueryFailedError(this.name(), error);
    }
  }

  /**
   * Short commit ids of the current branch's history, newest first.
   * A repository without commits gives an empty array.
   */
  async commits(): Promise<string[]> {
    let output: string;
    try {
      output = await this.git('log', '--pretty=format:%h');
    } catch (error) {
      throw new HistoryQueryFailedError(this.name(), error);
    }

    if (!output.trim()) {
      return [];
    }

    return output.split('\n').map(id => id.trim());
  }

  /**
   * Compares two references with a three-dot diff. Any diff output means
   * they have diverged.
   *
   * Resolves instead of rejecting when the comparison fails: the result is
   * then `diverged: true` together with the error, so a caller reading only
   * the flag treats an unknown state as diverged.
   */
  async diverged(from: string, to: string): Promise<DivergenceResult> {
    try {
      SecurityValidator.validateRef(from);
      SecurityValidator.validateRef(to);
      const output = await this.git('diff', `${from}...${to}`);
      return { diverged: output.length > 0 };
    } catch (error) {
      return {
        diverged: true,
        error: new DivergenceQueryFailedError(this.name(), from, to, error)
      };
    }
  }

  /**
   * Snapshot of branch, revision and history, read in that order.
   */
  async status(): Promise<RepoStatus> {
    const branch = await this.branch();
    const commitId = await this.commitId();
    const commits = await this.commits();

    return {
      name: this.name(),
      path: this.path(),
      deploymentPath: this.deploymentPath,
      branch,
      commitId,
      commits
    };
  }

  private async cloneIfAbsent(): Promise<void> {
    const name = this.name();

    try {
      SecurityValidator.validateRemote(this.remote, name);
    } catch (error) {
      throw new CloneFailedError(name || this.remote, error);
    }

    if (await this.exists()) {
      this.logger.info(`${name} already present at ${this.deploymentPath}, skipping clone`);
      return;
    }

    this.logger.info(`Cloning ${this.remote} into ${this.destination}`);
    try {
      await this.runner.run(this.gitBinary, ['clone', this.remote], this.destination);
    } catch (error) {
      this.logger.warning(`git clone failed for ${name}`);
      throw new CloneFailedError(name, error);
    }
  }

  private async git(...args: string[]): Promise<string> {
    this.logger.info(`git ${args.join(' ')} (${this.name()})`);
    return this.runner.run(this.gitBinary, args, this.deploymentPath);
  }
}

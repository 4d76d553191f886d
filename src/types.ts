import type { DivergenceQueryFailedError } from './errors.js';

/**
 * Narrow capability for running an external command.
 *
 * Resolves with the command's standard output and rejects on a non-zero
 * exit or when the process cannot be started. Swapping the implementation
 * swaps the version-control backend; tests use an in-process fake.
 *
 * @example
 * ```typescript
 * const runner: CommandRunner = {
 *   run: async (command, args, cwd) => {
 *     const { stdout } = await execa(command, [...args], { cwd });
 *     return stdout;
 *   }
 * };
 * ```
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], cwd: string): Promise<string>;
}

/**
 * Sink for progress messages emitted by a repository handle.
 */
export type RepoLogger = {
  info: (message: string) => void;
  warning: (message: string) => void;
};

/**
 * Options accepted by `Repository.clone`.
 */
export type RepositoryOptions = {
  /** Runs git; defaults to the execa-backed runner */
  runner?: CommandRunner;
  /** Name or path of the git executable (default `git`) */
  gitBinary?: string;
  /** Receives step-by-step progress; defaults to the console `ui` */
  logger?: RepoLogger;
};

/**
 * Outcome of comparing two references.
 *
 * When the comparison itself fails, `diverged` is `true` and `error`
 * explains why: callers that only look at the flag assume divergence.
 */
export type DivergenceResult = {
  diverged: boolean;
  error?: DivergenceQueryFailedError;
};

/**
 * Live view of a checkout, read straight from git.
 *
 * @example
 * ```typescript
 * const status: RepoStatus = {
 *   name: 'proj',
 *   path: 'org/proj',
 *   deploymentPath: '/work/proj',
 *   branch: 'main',
 *   commitId: '3f2a9c0e5b7d1f4a6c8e0b2d4f6a8c0e2b4d6f8a',
 *   commits: ['3f2a9c0', '91be7d2']
 * };
 * ```
 */
export type RepoStatus = {
  name: string;
  path: string;
  deploymentPath: string;
  branch: string;
  commitId: string;
  /** Short commit ids, newest first */
  commits: string[];
};

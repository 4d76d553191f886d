/**
 * Settings read from the environment. Command-line flags take precedence
 * over these in the CLI.
 */
export type SyncConfig = {
  /** Git executable to run (`REPO_SYNC_GIT`) */
  gitBinary: string;
  /** Directory checkouts are placed under when `--dest` is not given (`REPO_SYNC_DEST`) */
  destination: string;
  /** Show every git step (`REPO_SYNC_VERBOSE`) */
  verbose: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const gitBinary = env.REPO_SYNC_GIT?.trim();
  const destination = env.REPO_SYNC_DEST?.trim();
  const verbose = env.REPO_SYNC_VERBOSE?.trim().toLowerCase();

  return {
    gitBinary: gitBinary || 'git',
    destination: destination || process.cwd(),
    verbose: verbose === 'true' || verbose === '1'
  };
}

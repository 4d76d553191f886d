import { parseArgs } from 'util';
import { resolve } from 'path';
import { loadConfig } from './config.js';
import { RepoOperationError } from './errors.js';
import { getSyncSelection, UserCancelledError } from './prompts.js';
import { Repository } from './repository.js';
import { ui } from './ui.js';
import { EnvironmentUtils } from './utils/environment.js';
import { ErrorUtils, SecurityValidator } from './utils/security.js';
import type { RepoLogger } from './types.js';

export const USAGE = 'Usage: repo-sync [remote] [--dest <dir>] [--branch <name>] [--compare <ref>] [--verbose]';

export type CliOptions = {
  remote?: string;
  branch?: string;
  dest?: string;
  compare?: string;
  verbose: boolean;
  help: boolean;
};

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      dest: { type: 'string', short: 'd' },
      branch: { type: 'string', short: 'b' },
      compare: { type: 'string', short: 'c' },
      verbose: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    }
  });

  if (positionals.length > 1) {
    throw new Error(`Unexpected arguments: ${positionals.slice(1).join(' ')}`);
  }

  return {
    remote: positionals[0],
    branch: values.branch,
    dest: values.dest,
    compare: values.compare,
    verbose: values.verbose ?? false,
    help: values.help ?? false
  };
}

/**
 * Progress logger for the CLI: step-level info only in verbose mode.
 */
function createLogger(verbose: boolean): RepoLogger {
  return {
    info: verbose ? ui.info : () => {},
    warning: ui.warning
  };
}

/**
 * Report a failure and exit. Cancellation is not a failure.
 */
function handleError(error: unknown): never {
  console.log('');

  if (error instanceof UserCancelledError) {
    ui.userCancelled();
    process.exit(0);
  }

  if (error instanceof RepoOperationError) {
    const detail = error.cause === undefined
      ? ''
      : ` (${SecurityValidator.sanitizeErrorMessage(error.cause)})`;
    ui.stepFailed(error.operation, error.repository, `${error.message}${detail}`);
    process.exit(1);
  }

  const message = error instanceof Error
    ? SecurityValidator.sanitizeErrorMessage(error)
    : ErrorUtils.extractErrorMessage(error);
  ui.error(`❌ An error occurred: ${message}`);
  process.exit(1);
}

export async function main(argv: string[]): Promise<void> {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      console.log(USAGE);
      return;
    }

    const config = loadConfig();
    const verbose = options.verbose || config.verbose;

    ui.header('🚀 Repository Sync\n');

    // Phase 1: work out what to sync
    const selection = await getSyncSelection(
      { remote: options.remote, branch: options.branch },
      EnvironmentUtils.isInteractive()
    );
    const destination = resolve(options.dest ?? config.destination);

    // Phase 2: make sure the checkout exists
    const repo = await Repository.clone(selection.remote, destination, {
      gitBinary: config.gitBinary,
      logger: createLogger(verbose)
    });
    ui.preparing(repo.name(), repo.deploymentPath);

    // Phase 3: fetch, checkout, pull
    ui.syncing(repo.name(), selection.branch);
    await repo.sync(selection.branch);

    // Phase 4: report
    ui.statusSummary(await repo.status());

    if (options.compare) {
      const { diverged, error } = await repo.diverged(options.compare, selection.branch);
      if (error) {
        ui.warning(`Could not compare ${options.compare} with ${selection.branch}, assuming divergence`);
      }
      ui.divergence(options.compare, selection.branch, diverged);
    }

    ui.success(`🎉 ${repo.name()} is up to date with ${selection.branch}`);
  } catch (error) {
    handleError(error);
  }
}

import pc from 'picocolors';
import type { RepoStatus } from './types.js';

/**
 * Centralized UI messaging utilities for consistent CLI experience
 */
export const ui = {
  // Headers and titles
  header: (message: string) => console.log(pc.cyan(message)),

  // Status messages
  success: (message: string) => console.log(pc.green(message)),
  error: (message: string) => console.log(pc.red(message)),
  warning: (message: string) => console.log(pc.yellow(message)),
  info: (message: string) => console.log(pc.gray(message)),

  // Common message patterns
  preparing: (name: string, deploymentPath: string) =>
    console.log(pc.gray(`Preparing ${name} in: ${deploymentPath}\n`)),

  syncing: (name: string, branch: string) =>
    console.log(pc.blue(`🔄 Syncing ${pc.bold(name)} to ${branch}...`)),

  statusSummary: (status: RepoStatus) => {
    console.log(pc.cyan('📋 Repository Status:'));
    console.log(`  Repository: ${pc.bold(status.name)} (${status.path})`);
    console.log(`  Location:   ${status.deploymentPath}`);
    console.log(`  Branch:     ${status.branch}`);
    console.log(`  Revision:   ${status.commitId}`);
    console.log(`  Commits:    ${status.commits.length}`);
  },

  divergence: (from: string, to: string, diverged: boolean) =>
    diverged
      ? console.log(pc.yellow(`⚠️  ${from} and ${to} have diverged`))
      : console.log(pc.green(`✓ ${from} and ${to} are in sync`)),

  // Error messages with suggestions
  stepFailed: (operation: string, repository: string, message: string) => {
    ui.error(`❌ ${operation} failed for ${repository}: ${message}`);
    ui.warning('💡 The checkout was left as git left it; fix the cause and run again.');
  },

  userCancelled: () => {
    ui.warning('⚠️  Operation cancelled by user');
  }
} as const;

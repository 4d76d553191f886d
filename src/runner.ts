import { execa } from 'execa';
import type { CommandRunner } from './types.js';

/**
 * Default `CommandRunner`: spawns the command with execa and resolves with
 * its standard output. execa rejects on a non-zero exit code, so failures
 * reach the caller as the execa error.
 */
export function createExecaRunner(): CommandRunner {
  return {
    async run(command, args, cwd) {
      const { stdout } = await execa(command, [...args], {
        cwd,
        shell: false // Explicitly disable shell interpretation
      });
      return stdout;
    }
  };
}

import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'fs';
import { join } from 'path';
import type { CommandRunner } from '../src/types.js';

const state = vi.hoisted(() => {
  const holder: { runner?: CommandRunner } = {};
  return holder;
});

vi.mock('../src/runner.js', () => ({
  createExecaRunner: () => {
    if (!state.runner) {
      throw new Error('test runner not installed');
    }
    return state.runner;
  }
}));
vi.mock('../src/ui.js');
vi.mock('../src/prompts.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/prompts.js')>();
  return { ...actual, getSyncSelection: vi.fn(actual.getSyncSelection) };
});

import { main, parseCliArgs, USAGE } from '../src/cli.js';
import * as prompts from '../src/prompts.js';
import { ui } from '../src/ui.js';
import { createTestDir, errorMatchers, FakeRunner } from './utils/index.js';

const REMOTE = 'git@host:org/proj.git';

describe('parseCliArgs', () => {
  test('reads the remote and flags', () => {
    expect(parseCliArgs([REMOTE, '--dest', '/srv', '-b', 'release', '--compare', 'main', '-v'])).toEqual({
      remote: REMOTE,
      dest: '/srv',
      branch: 'release',
      compare: 'main',
      verbose: true,
      help: false
    });
  });

  test('leaves missing values undefined', () => {
    expect(parseCliArgs([])).toEqual({
      remote: undefined,
      dest: undefined,
      branch: undefined,
      compare: undefined,
      verbose: false,
      help: false
    });
  });

  test('rejects extra positionals', () => {
    expect(() => parseCliArgs([REMOTE, 'other'])).toThrow('Unexpected arguments: other');
  });
});

describe('Main CLI Workflow', () => {
  let testDir: string;
  let runner: FakeRunner;

  beforeEach(() => {
    vi.clearAllMocks();
    testDir = createTestDir('cli-test', expect.getState().currentTestName);
    runner = new FakeRunner()
      .respond('rev-parse --abbrev-ref HEAD', 'release\n')
      .respond('rev-parse HEAD', '9c1d2e3f4a5b6c7d8e9f0a1b2c3d4e5f6a7b8c9d\n')
      .respond('log', '9c1d2e3\n4f5a6b7');
    state.runner = runner;

    // Mock process.exit to throw instead of exiting
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`Process exited with code ${code}`);
    });

    // Mock console.log to prevent test output noise
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  test('clones, syncs and reports status', async () => {
    await main([REMOTE, '--dest', testDir, '--branch', 'release']);

    const deploymentPath = join(testDir, 'proj');
    expect(runner.calls.map(call => [call.cwd, ...call.args])).toEqual([
      [testDir, 'clone', REMOTE],
      [deploymentPath, 'fetch'],
      [deploymentPath, 'checkout', 'release'],
      [deploymentPath, 'pull'],
      [deploymentPath, 'rev-parse', '--abbrev-ref', 'HEAD'],
      [deploymentPath, 'rev-parse', 'HEAD'],
      [deploymentPath, 'log', '--pretty=format:%h']
    ]);
    expect(ui.header).toHaveBeenCalledWith('🚀 Repository Sync\n');
    expect(ui.preparing).toHaveBeenCalledWith('proj', deploymentPath);
    expect(ui.syncing).toHaveBeenCalledWith('proj', 'release');
    expect(ui.statusSummary).toHaveBeenCalledWith({
      name: 'proj',
      path: 'org/proj',
      deploymentPath,
      branch: 'release',
      commitId: '9c1d2e3f4a5b6c7d8e9f0a1b2c3d4e5f6a7b8c9d',
      commits: ['9c1d2e3', '4f5a6b7']
    });
    expect(ui.success).toHaveBeenCalledWith('🎉 proj is up to date with release');
    expect(ui.divergence).not.toHaveBeenCalled();
  });

  test('keeps step logging quiet unless verbose', async () => {
    await main([REMOTE, '--dest', testDir, '--branch', 'release']);
    expect(ui.info).not.toHaveBeenCalled();

    await main([REMOTE, '--dest', testDir, '--branch', 'release', '--verbose']);
    expect(ui.info).toHaveBeenCalledWith('git fetch (proj)');
  });

  test('reports divergence against a comparison reference', async () => {
    runner.respond('diff', 'diff --git a/deploy.yml b/deploy.yml');

    await main([REMOTE, '--dest', testDir, '--branch', 'release', '--compare', 'main']);

    expect(runner.argLists.at(-1)).toEqual(['diff', 'main...release']);
    expect(ui.divergence).toHaveBeenCalledWith('main', 'release', true);
    expect(ui.warning).not.toHaveBeenCalled();
  });

  test('warns and assumes divergence when the comparison fails', async () => {
    runner.fail('diff');

    await main([REMOTE, '--dest', testDir, '--branch', 'release', '--compare', 'missing']);

    expect(ui.warning).toHaveBeenCalledWith('Could not compare missing with release, assuming divergence');
    expect(ui.divergence).toHaveBeenCalledWith('missing', 'release', true);
  });

  test('names the failed step and exits with code 1', async () => {
    runner.fail('checkout', "error: pathspec 'release' did not match any file(s) known to git");

    await expect(main([REMOTE, '--dest', testDir, '--branch', 'release']))
      .rejects.toThrow(errorMatchers.processExit(1));

    expect(ui.stepFailed).toHaveBeenCalledWith(
      'checkout',
      'proj',
      "could not checkout repo branch proj:release (error: pathspec 'release' did not match any file(s) known to git)"
    );
    expect(runner.argLists).not.toContainEqual(['pull']);
    expect(ui.success).not.toHaveBeenCalled();
  });

  test('exits with code 0 when the user cancels', async () => {
    vi.mocked(prompts.getSyncSelection).mockRejectedValueOnce(new prompts.UserCancelledError());

    await expect(main(['--dest', testDir])).rejects.toThrow(errorMatchers.processExit(0));

    expect(ui.userCancelled).toHaveBeenCalledOnce();
    expect(runner.calls).toHaveLength(0);
  });

  test('reports unexpected errors with a sanitized message', async () => {
    await expect(main([REMOTE, 'extra'])).rejects.toThrow(errorMatchers.processExit(1));

    expect(ui.error).toHaveBeenCalledWith('❌ An error occurred: Unexpected arguments: extra');
  });

  test('prints usage for --help', async () => {
    await main(['--help']);

    expect(console.log).toHaveBeenCalledWith(USAGE);
    expect(ui.header).not.toHaveBeenCalled();
  });
});

import type { ChildProcess } from 'node:child_process';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

import { program } from '../../src/cli.js';
import { CONFIG_FILENAME, requireConfig } from '../../src/core/config.js';
import { PlaybookNotFoundError } from '../../src/utils/errors.js';
import { createMockChild } from '../unit/helpers/mock-child-process.js';

const { mockedSpawn } = vi.hoisted(() => ({
  mockedSpawn: vi.fn<(command: string, options?: object) => ChildProcess>(),
}));

vi.mock('node:child_process', () => ({
  spawn: mockedSpawn,
}));

vi.mock('../../src/ui/prompts.js', () => ({
  isInteractive: vi.fn(() => false),
  inputPrompt: vi.fn(),
  confirmPrompt: vi.fn(),
}));

// commander keeps parsed option values on the shared program, so flags set by one
// invocation stay set for later ones in this file.
async function cli(dir: string, ...args: string[]): Promise<void> {
  await program.parseAsync(['node', 'pocketplan', '--config', dir, ...args]);
}

function printed(): string[] {
  return vi.mocked(console.log).mock.calls.map((call) => call.map(String).join(' '));
}

describe('CLI flow', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pocketplan-cli-'));
    mockedSpawn.mockReset();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.mocked(console.log).mockRestore();
    vi.mocked(console.error).mockRestore();
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  it('initializes and shows the configuration', async () => {
    await cli(dir, 'init');

    expect((await stat(join(dir, CONFIG_FILENAME))).isFile()).toBe(true);
    expect((await stat(join(dir, 'workspace'))).isDirectory()).toBe(true);

    await cli(dir, 'show', '--playbooks');

    const lines = printed();
    expect(lines).toContain(' - bootstrap-termux: pkg update -y, pkg install -y git nodejs');
    expect(lines).toContain(' - run-tests: npm test');
    expect(lines.some((line) => line.includes('heuristic'))).toBe(true);
  });

  it('adds and removes playbooks', async () => {
    await cli(dir, 'init');
    await cli(dir, 'playbook', 'add', 'hello', 'echo hello', 'echo world');

    expect((await requireConfig(dir)).playbooks.hello).toEqual(['echo hello', 'echo world']);

    await cli(dir, 'playbook', 'remove', 'hello');
    expect(Object.keys((await requireConfig(dir)).playbooks).sort()).toEqual([
      'bootstrap-termux',
      'run-tests',
    ]);

    await expect(cli(dir, 'playbook', 'remove', 'hello')).rejects.toThrow(PlaybookNotFoundError);
  });

  it('prints a plan as JSON', async () => {
    await cli(dir, 'plan', '--json', 'create api endpoint.', 'add tests.');

    const output = printed().find((line) => line.startsWith('{'));
    expect(output).toBeDefined();
    const plan = JSON.parse(output ?? '{}') as { summary: string; steps: unknown[] };
    expect(plan.summary).toBe('Create api endpoint');
    expect(plan.steps).toEqual([{ title: 'Create api endpoint' }, { title: 'Add tests' }]);
  });

  it('runs playbooks', async () => {
    await cli(dir, 'init');

    mockedSpawn.mockImplementation(() => createMockChild(0));
    await cli(dir, 'run', 'bootstrap-termux');
    expect(mockedSpawn.mock.calls.map((call) => call[0])).toEqual([
      'pkg update -y',
      'pkg install -y git nodejs',
    ]);
    expect(mockedSpawn).toHaveBeenCalledWith(
      'pkg update -y',
      expect.objectContaining({ cwd: resolve(dir) }),
    );
    expect(process.exitCode).toBeUndefined();

    mockedSpawn.mockReset();
    mockedSpawn.mockImplementation(() => createMockChild(4));
    await cli(dir, 'run', 'run-tests');
    expect(process.exitCode).toBe(4);

    await expect(cli(dir, 'run', 'missing')).rejects.toThrow(
      "Playbook 'missing' not found. Available: bootstrap-termux, run-tests",
    );

    mockedSpawn.mockReset();
    await cli(dir, 'run', 'run-tests', '--dry-run');
    expect(mockedSpawn).not.toHaveBeenCalled();
    expect(printed()).toContain(' - npm test');
  });
});

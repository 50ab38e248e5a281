import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { Command } from 'commander';
import { registerRun } from '../../../src/commands/run.js';
import { FakeDownloader, FakeRunner, makeTempDir, touch } from '../../helpers/fakes.js';

class ExitCalled extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${code})`);
  }
}

describe('run command', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    vi.stubEnv('RIGUP_HOME', join(dir, 'home'));
    vi.stubEnv('RIGUP_LOG_LEVEL', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  function capture() {
    const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ExitCalled(code);
    });
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const text = (spy: typeof log) => spy.mock.calls.map((args) => args.join(' ')).join('\n');
    return { exit, stdout: () => text(log), stderr: () => text(error) };
  }

  function writeCatalog(lines: string[]): string {
    return touch(join(dir, 'catalog.yaml'), `${lines.join('\n')}\n`);
  }

  async function run(runner: FakeRunner, args: string[]): Promise<void> {
    const program = new Command().exitOverride();
    registerRun(program, { runner, downloader: new FakeDownloader(), sinks: [] });
    await program.parseAsync(['node', 'rigup', 'run', '-y', ...args]);
  }

  it('completes without exiting when an item fails', async () => {
    const out = capture();
    const catalog = writeCatalog([
      'version: 1',
      'apps:',
      '  - { name: Broken, installMethod: custom, command: broken }',
    ]);

    await run(new FakeRunner(() => ({ exitCode: 1 })), ['--catalog', catalog]);

    expect(out.exit).not.toHaveBeenCalled();
    expect(out.stdout()).toContain('Provisioned 0/1 application(s): 0 already present, 0 installed, 0 unverified.');
    expect(out.stdout()).toContain('  - Broken: installer exited with code 1');
    expect(out.stdout()).toContain('WARNING: 1 application(s) failed.');
  });

  it('exits with 1 when the catalog cannot be loaded', async () => {
    const out = capture();
    const missing = join(dir, 'missing.yaml');

    await expect(run(new FakeRunner(), ['--catalog', missing])).rejects.toThrow(ExitCalled);

    expect(out.exit).toHaveBeenCalledWith(1);
    expect(out.stderr()).toContain(`Cannot read catalog ${missing}`);
  });

  it('prints next steps with the given email once everything is installed', async () => {
    const out = capture();
    const exe = join(dir, 'apps', 'Git', 'git.exe');
    const catalog = writeCatalog([
      'version: 1',
      'apps:',
      '  - name: Git',
      '    installMethod: custom',
      '    command: install-git',
      `    detectionPaths: [${JSON.stringify(exe)}]`,
      `    nextSteps: ['git config --global user.email "{{email}}"']`,
    ]);
    const runner = new FakeRunner(() => {
      touch(exe);
      return {};
    });

    await run(runner, ['--catalog', catalog, '--email', 'dev@example.test']);

    expect(out.exit).not.toHaveBeenCalled();
    expect(runner.calls).toHaveLength(1);
    expect(out.stdout()).toContain('  1. git config --global user.email "dev@example.test"');
  });

  it('still reports a completed run when a next step fails to render', async () => {
    const out = capture();
    const exe = touch(join(dir, 'apps', 'Tool', 'tool.exe'));
    const catalog = writeCatalog([
      'version: 1',
      'apps:',
      '  - name: Tool',
      '    installMethod: custom',
      '    command: install-tool',
      `    detectionPaths: [${JSON.stringify(exe)}]`,
      `    nextSteps: ['{{shout email}}']`,
    ]);

    await run(new FakeRunner(), ['--catalog', catalog]);

    expect(out.exit).not.toHaveBeenCalled();
    expect(out.stderr()).toContain('Could not render next steps: Missing helper: "shout"');
    expect(out.stdout()).toContain('All applications are in place.');
  });
});

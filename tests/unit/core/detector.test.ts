import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { PACKAGE_MANAGER_DEFINITIONS, PackageManagerAdapter } from '../../../src/core/adapters/index.js';
import { Detector } from '../../../src/core/detector.js';
import { CommandProbe } from '../../../src/core/probe.js';
import { FakeRunner, descriptor, makeExecutable, makeTempDir, touch } from '../../helpers/fakes.js';

describe('Detector', () => {
  let root: string;
  let binDir: string;

  beforeEach(() => {
    root = makeTempDir();
    binDir = join(root, 'bin');
    makeExecutable(binDir, 'placeholder');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function detector(runner = new FakeRunner()): Detector {
    const probe = new CommandProbe({ searchPath: [binDir] });
    return new Detector({
      probe,
      packageManagers: {
        scoop: new PackageManagerAdapter(PACKAGE_MANAGER_DEFINITIONS.scoop, {
          runner,
          probe,
          platform: 'linux',
        }),
      },
      env: { APPS: join(root, 'apps') },
      home: join(root, 'home'),
    });
  }

  it('finds an app by an expanded wildcard path', async () => {
    const exe = touch(join(root, 'apps', 'Tool-1.2', 'tool.exe'));
    const tool = descriptor({
      name: 'Tool',
      installMethod: 'custom',
      command: 'install-tool',
      detectionPaths: ['%APPS%/Tool-*/tool.exe'],
    });

    expect(await detector().detect(tool)).toEqual({
      found: true,
      method: 'filesystem path',
      matchedPath: exe,
    });
  });

  it('expands the home directory', async () => {
    const config = touch(join(root, 'home', '.toolrc'));
    const tool = descriptor({
      name: 'Tool',
      installMethod: 'custom',
      command: 'install-tool',
      detectionPaths: ['~/.toolrc'],
    });

    expect(await detector().detect(tool)).toMatchObject({ found: true, matchedPath: config });
  });

  it('tries paths before the detection command', async () => {
    touch(join(root, 'apps', 'tool.exe'));
    makeExecutable(binDir, 'tool');
    const tool = descriptor({
      name: 'Tool',
      installMethod: 'custom',
      command: 'install-tool',
      detectionPaths: ['%APPS%/tool.exe'],
      detectionCommand: 'tool',
    });

    expect(await detector().detect(tool)).toMatchObject({ method: 'filesystem path' });
  });

  it('falls back to the detection command', async () => {
    makeExecutable(binDir, 'tool');
    const tool = descriptor({
      name: 'Tool',
      installMethod: 'custom',
      command: 'install-tool',
      detectionPaths: ['%APPS%/missing/tool.exe'],
      detectionCommand: 'tool',
    });

    expect(await detector().detect(tool)).toEqual({ found: true, method: 'command probe' });
  });

  it('consults the package listing only when asked to', async () => {
    makeExecutable(binDir, 'scoop');
    const runner = new FakeRunner(() => ({ stdout: 'Installed apps:\n\njq 1.7.1 main\n' }));
    const listed = descriptor({
      name: 'jq',
      installMethod: 'scoop',
      packageRef: 'main/jq',
      detectViaListing: true,
    });
    const unlisted = descriptor({ name: 'jq', installMethod: 'scoop', packageRef: 'main/jq' });

    expect(await detector(runner).detect(listed)).toEqual({ found: true, method: 'package listing' });
    expect(await detector(runner).detect(unlisted)).toEqual({ found: false });
    expect(runner.calls).toHaveLength(1);
  });

  it('reports not found when nothing matches', async () => {
    const tool = descriptor({
      name: 'Tool',
      installMethod: 'download',
      downloadUrl: 'http://x/installer.exe',
      detectionPaths: ['%APPS%/Tool/tool.exe'],
      detectionCommand: 'tool',
    });

    expect(await detector().detect(tool)).toEqual({ found: false });
  });

  it('returns a fresh result each time', async () => {
    const tool = descriptor({ name: 'Tool', installMethod: 'custom', command: 'install-tool' });
    const d = detector();
    const first = await d.detect(tool);
    const second = await d.detect(tool);
    expect(first).toEqual(second);
    expect(first).not.toBe(second);
  });
});

import { chmodSync, mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { vi } from 'vitest';
import { AppDescriptorSchema } from '../../src/config/schema.js';
import { Logger, type LogRecord } from '../../src/core/logger.js';
import type { AdapterSet, InstallContext, InstallResult } from '../../src/core/adapters/index.js';
import type { AppDescriptor, AppDescriptorInput } from '../../src/types/descriptor.js';
import type { Downloader } from '../../src/utils/download.js';
import type { ProcessResult, ProcessRunner, RunOptions } from '../../src/utils/process.js';
import { okResult } from '../../src/utils/result.js';

export function makeTempDir(prefix = 'rigup-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function touch(path: string, content = ''): string {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
  return path;
}

/** A command the probe resolves by `name`: a `.cmd` stub on Windows, a shell script elsewhere. */
export function makeExecutable(dir: string, name: string): string {
  if (process.platform === 'win32') {
    return touch(join(dir, `${name}.cmd`), '@exit /b 0\r\n');
  }
  const path = touch(join(dir, name), '#!/bin/sh\nexit 0\n');
  chmodSync(path, 0o755);
  return path;
}

/** A file named `name` that the probe must not treat as a command. */
export function makeNonExecutable(dir: string, name: string): string {
  const path = touch(join(dir, name), 'data');
  if (process.platform !== 'win32') chmodSync(path, 0o644);
  return path;
}

export function descriptor(input: AppDescriptorInput): AppDescriptor {
  return AppDescriptorSchema.parse(input);
}

export interface RunCall {
  command: string;
  args: string[];
  options: RunOptions;
}

type Respond = (call: RunCall) => Partial<ProcessResult> | Promise<Partial<ProcessResult>>;

/** Records every call and answers with exit code 0 unless told otherwise. */
export class FakeRunner implements ProcessRunner {
  readonly calls: RunCall[] = [];

  constructor(private readonly respond: Respond = () => ({})) {}

  async run(command: string, args: string[], options: RunOptions): Promise<ProcessResult> {
    const call = { command, args, options };
    this.calls.push(call);
    const result = await this.respond(call);
    return {
      exitCode: 0,
      stdout: '',
      stderr: '',
      timedOut: false,
      durationMs: 0,
      ...result,
    };
  }
}

/** Writes a small placeholder file unless a custom behaviour is given. */
export class FakeDownloader implements Downloader {
  readonly downloads: { url: string; destination: string }[] = [];

  constructor(private readonly behave?: (url: string, destination: string) => void | Promise<void>) {}

  async download(url: string, destination: string): Promise<void> {
    this.downloads.push({ url, destination });
    if (this.behave) {
      await this.behave(url, destination);
      return;
    }
    writeFileSync(destination, 'fake installer');
  }
}

export function memoryLogger(threshold: LogRecord['level'] = 'Debug'): {
  logger: Logger;
  records: LogRecord[];
} {
  const records: LogRecord[] = [];
  const logger = new Logger({
    threshold,
    sinks: [(record) => records.push(record)],
  });
  return { logger, records };
}

type InstallImpl = (descriptor: AppDescriptor, context: InstallContext) => Promise<InstallResult>;

/** Adapter set whose every install is a vitest spy. */
export function spyAdapters(impl: Partial<Record<AppDescriptor['installMethod'], InstallImpl>> = {}) {
  const succeed: InstallImpl = async () => okResult(undefined);
  const adapters = {
    scoop: { install: vi.fn(impl.scoop ?? succeed) },
    winget: { install: vi.fn(impl.winget ?? succeed) },
    download: { install: vi.fn(impl.download ?? succeed) },
    custom: { install: vi.fn(impl.custom ?? succeed) },
  };
  const set: AdapterSet = adapters;
  return { adapters, set };
}

import { randomUUID } from 'node:crypto';
import { chmodSync, rmSync } from 'node:fs';
import { extname, join, posix } from 'node:path';
import type { DownloadDescriptor } from '../../types/descriptor.js';
import type { Downloader } from '../../utils/download.js';
import { ensureDir, fileExists } from '../../utils/fs.js';
import { splitArgs, type ProcessRunner } from '../../utils/process.js';
import { errResult } from '../../utils/result.js';
import { errorMessage } from '../errors.js';
import { mapProcessResult } from './shared.js';
import type { BackendAdapter, InstallContext, InstallResult } from './types.js';

export interface DirectDownloadAdapterOptions {
  runner: ProcessRunner;
  downloader: Downloader;
  scratchDir: string;
  platform?: NodeJS.Platform;
}

const FALLBACK_ARTIFACT = 'installer.exe';

/** File name taken from the URL path, restricted to a safe character set. */
export function artifactName(url: string): string {
  try {
    const name = posix.basename(decodeURIComponent(new URL(url).pathname)).replace(/[^A-Za-z0-9._-]/g, '_');
    return name && name !== '.' && name !== '..' ? name : FALLBACK_ARTIFACT;
  } catch {
    return FALLBACK_ARTIFACT;
  }
}

function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

export class DirectDownloadAdapter implements BackendAdapter<DownloadDescriptor> {
  private readonly runner: ProcessRunner;
  private readonly downloader: Downloader;
  private readonly platform: NodeJS.Platform;

  readonly scratchDir: string;

  constructor(options: DirectDownloadAdapterOptions) {
    this.scratchDir = options.scratchDir;
    this.runner = options.runner;
    this.downloader = options.downloader;
    this.platform = options.platform ?? process.platform;
  }

  /** Unique path for one download; sequential calls never share a file. */
  artifactPath(descriptor: DownloadDescriptor): string {
    return join(this.scratchDir, `${randomUUID()}-${artifactName(descriptor.downloadUrl)}`);
  }

  /**
   * The download and the installer share one time budget: the installer only
   * gets what the download left over.
   */
  async install(descriptor: DownloadDescriptor, context: InstallContext): Promise<InstallResult> {
    const artifact = this.artifactPath(descriptor);
    const deadline = Date.now() + context.timeoutMs;
    const timedOut: InstallResult = errResult({ kind: 'timeout', timeoutMs: context.timeoutMs });

    try {
      try {
        ensureDir(this.scratchDir);
        context.logger.debug(`Downloading ${descriptor.downloadUrl} to ${artifact}`);
        await this.downloader.download(descriptor.downloadUrl, artifact, {
          timeoutMs: context.timeoutMs,
        });
        if (!fileExists(artifact)) {
          throw new Error('no file was written');
        }
        if (this.platform !== 'win32') {
          chmodSync(artifact, 0o755);
        }
      } catch (err) {
        if (isTimeoutError(err)) return timedOut;
        return errResult({ kind: 'download-failure', cause: errorMessage(err) });
      }

      const remainingMs = deadline - Date.now();
      if (remainingMs <= 0) return timedOut;

      const args = splitArgs(descriptor.installerArgs);
      const isMsi = extname(artifact).toLowerCase() === '.msi';
      const command = isMsi ? 'msiexec' : artifact;
      const argv = isMsi ? ['/i', artifact, ...args] : args;

      context.logger.debug(`Running ${command} ${argv.join(' ')}`);
      const result = await this.runner.run(command, argv, { timeoutMs: remainingMs });
      return mapProcessResult(result, context.timeoutMs);
    } finally {
      this.removeArtifact(artifact, context);
    }
  }

  // An installer killed on timeout can still hold its file open
  private removeArtifact(artifact: string, context: InstallContext): void {
    try {
      rmSync(artifact, { force: true });
    } catch (err) {
      context.logger.warn(`Could not remove ${artifact}: ${errorMessage(err)}`);
    }
  }
}

import type { PackageManagerId } from '../../config/schema.js';
import type { PackageDescriptor } from '../../types/descriptor.js';
import type { ProcessRunner } from '../../utils/process.js';
import { errResult } from '../../utils/result.js';
import type { CommandProbe } from '../probe.js';
import { mapProcessResult } from './shared.js';
import type { BackendAdapter, InstallContext, InstallResult } from './types.js';

export interface PackageManagerDefinition {
  id: PackageManagerId;
  executable: string;
  installArgs(packageRef: string): string[];
  listArgs(packageRef: string): string[];
  /** Text searched for in the listing output. */
  listingNeedle(packageRef: string): string;
}

export const PACKAGE_MANAGER_DEFINITIONS: Record<PackageManagerId, PackageManagerDefinition> = {
  scoop: {
    id: 'scoop',
    executable: 'scoop',
    installArgs: (ref) => ['install', ref],
    listArgs: () => ['list'],
    // "extras/vscode" is listed as "vscode"
    listingNeedle: (ref) => ref.split('/').pop() ?? ref,
  },
  winget: {
    id: 'winget',
    executable: 'winget',
    installArgs: (ref) => [
      'install',
      '--id',
      ref,
      '--exact',
      '--silent',
      '--accept-source-agreements',
      '--accept-package-agreements',
    ],
    listArgs: (ref) => ['list', '--id', ref, '--exact', '--accept-source-agreements'],
    listingNeedle: (ref) => ref,
  },
};

export interface PackageManagerAdapterOptions {
  runner: ProcessRunner;
  probe: CommandProbe;
  /** Timeout for listing queries. */
  listTimeoutMs?: number;
  platform?: NodeJS.Platform;
}

const DEFAULT_LIST_TIMEOUT_MS = 60_000;

export class PackageManagerAdapter implements BackendAdapter<PackageDescriptor> {
  private readonly runner: ProcessRunner;
  private readonly probe: CommandProbe;
  private readonly listTimeoutMs: number;
  // scoop and winget are .ps1/.cmd shims on Windows and need a shell
  private readonly useShell: boolean;

  constructor(
    readonly definition: PackageManagerDefinition,
    options: PackageManagerAdapterOptions,
  ) {
    this.runner = options.runner;
    this.probe = options.probe;
    this.listTimeoutMs = options.listTimeoutMs ?? DEFAULT_LIST_TIMEOUT_MS;
    this.useShell = (options.platform ?? process.platform) === 'win32';
  }

  isBackendAvailable(): boolean {
    return this.probe.isAvailable(this.definition.executable);
  }

  async install(descriptor: PackageDescriptor, context: InstallContext): Promise<InstallResult> {
    const { executable } = this.definition;
    if (!this.isBackendAvailable()) {
      return errResult({ kind: 'unavailable', tool: executable });
    }

    const args = this.definition.installArgs(descriptor.packageRef);
    context.logger.debug(`${executable} ${args.join(' ')}`);

    const result = await this.runner.run(executable, args, {
      timeoutMs: context.timeoutMs,
      shell: this.useShell,
    });
    return mapProcessResult(result, context.timeoutMs);
  }

  /**
   * Whether the manager's installed-package listing mentions the package
   * (case-insensitive substring match). Any failure counts as "not listed".
   */
  async isListed(descriptor: PackageDescriptor): Promise<boolean> {
    if (!this.isBackendAvailable()) return false;
    try {
      const result = await this.runner.run(
        this.definition.executable,
        this.definition.listArgs(descriptor.packageRef),
        { timeoutMs: this.listTimeoutMs, shell: this.useShell },
      );
      if (result.timedOut || result.exitCode !== 0) return false;
      const needle = this.definition.listingNeedle(descriptor.packageRef).toLowerCase();
      return result.stdout.toLowerCase().includes(needle);
    } catch {
      return false;
    }
  }
}

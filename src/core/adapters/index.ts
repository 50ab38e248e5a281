import type { AppDescriptor } from '../../types/descriptor.js';
import type { Downloader } from '../../utils/download.js';
import type { ProcessRunner } from '../../utils/process.js';
import type { CommandProbe } from '../probe.js';
import { CustomCommandAdapter } from './custom-command.js';
import { DirectDownloadAdapter } from './direct-download.js';
import { PackageManagerAdapter, PACKAGE_MANAGER_DEFINITIONS } from './package-manager.js';
import type { AdapterSet, InstallContext, InstallResult } from './types.js';

export * from './types.js';
export { PackageManagerAdapter, PACKAGE_MANAGER_DEFINITIONS } from './package-manager.js';
export type { PackageManagerDefinition } from './package-manager.js';
export { DirectDownloadAdapter, artifactName } from './direct-download.js';
export { CustomCommandAdapter } from './custom-command.js';

export interface DefaultAdapters extends AdapterSet {
  scoop: PackageManagerAdapter;
  winget: PackageManagerAdapter;
}

export interface CreateAdaptersOptions {
  runner: ProcessRunner;
  downloader: Downloader;
  probe: CommandProbe;
  scratchDir: string;
  platform?: NodeJS.Platform;
}

export function createAdapters(options: CreateAdaptersOptions): DefaultAdapters {
  const { runner, probe, platform } = options;
  return {
    scoop: new PackageManagerAdapter(PACKAGE_MANAGER_DEFINITIONS.scoop, { runner, probe, platform }),
    winget: new PackageManagerAdapter(PACKAGE_MANAGER_DEFINITIONS.winget, { runner, probe, platform }),
    download: new DirectDownloadAdapter({
      runner,
      downloader: options.downloader,
      scratchDir: options.scratchDir,
      platform,
    }),
    custom: new CustomCommandAdapter(runner),
  };
}

/** Hands the descriptor to the adapter for its install method. */
export function dispatch(
  adapters: AdapterSet,
  descriptor: AppDescriptor,
  context: InstallContext,
): Promise<InstallResult> {
  switch (descriptor.installMethod) {
    case 'scoop':
      return adapters.scoop.install(descriptor, context);
    case 'winget':
      return adapters.winget.install(descriptor, context);
    case 'download':
      return adapters.download.install(descriptor, context);
    case 'custom':
      return adapters.custom.install(descriptor, context);
  }
}

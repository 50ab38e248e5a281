import { homedir } from 'node:os';
import type { PackageManagerId } from '../config/schema.js';
import type { AppDescriptor } from '../types/descriptor.js';
import type { DetectionResult } from '../types/provision.js';
import { expandPath, matchPaths } from '../utils/paths.js';
import type { PackageManagerAdapter } from './adapters/package-manager.js';
import { errorMessage } from './errors.js';
import type { ComponentLogger } from './logger.js';
import type { CommandProbe } from './probe.js';

export interface DetectorOptions {
  probe: CommandProbe;
  /** Managers consulted for descriptors that set `detectViaListing`. */
  packageManagers?: Partial<Record<PackageManagerId, PackageManagerAdapter>>;
  logger?: ComponentLogger;
  env?: Record<string, string | undefined>;
  home?: string;
}

/**
 * Decides whether a descriptor is already installed. Strategies run in a
 * fixed order and the first hit wins:
 *
 * 1. `detectionPaths`, each expanded and wildcard-matched
 * 2. `detectionCommand` resolved on the search path
 * 3. the package manager's installed listing, when `detectViaListing` is set
 *
 * Detection is best-effort: errors are logged at debug level and count as
 * "not found".
 */
export class Detector {
  private readonly probe: CommandProbe;
  private readonly packageManagers: Partial<Record<PackageManagerId, PackageManagerAdapter>>;
  private readonly logger?: ComponentLogger;
  private readonly env: Record<string, string | undefined>;
  private readonly home: string;

  constructor(options: DetectorOptions) {
    this.probe = options.probe;
    this.packageManagers = options.packageManagers ?? {};
    this.logger = options.logger;
    this.env = options.env ?? process.env;
    this.home = options.home ?? homedir();
  }

  async detect(descriptor: AppDescriptor): Promise<DetectionResult> {
    for (const pattern of descriptor.detectionPaths) {
      const matched = this.matchDetectionPath(pattern);
      if (matched) {
        this.logger?.debug(`${descriptor.name}: found at ${matched}`);
        return { found: true, method: 'filesystem path', matchedPath: matched };
      }
    }

    if (descriptor.detectionCommand && this.probe.isAvailable(descriptor.detectionCommand)) {
      this.logger?.debug(`${descriptor.name}: "${descriptor.detectionCommand}" is on the search path`);
      return { found: true, method: 'command probe' };
    }

    if (
      (descriptor.installMethod === 'scoop' || descriptor.installMethod === 'winget') &&
      descriptor.detectViaListing
    ) {
      const manager = this.packageManagers[descriptor.installMethod];
      if (manager && (await manager.isListed(descriptor))) {
        this.logger?.debug(`${descriptor.name}: listed by ${descriptor.installMethod}`);
        return { found: true, method: 'package listing' };
      }
    }

    this.logger?.debug(`${descriptor.name}: not detected`);
    return { found: false };
  }

  private matchDetectionPath(pattern: string): string | null {
    try {
      const expanded = expandPath(pattern, this.env, this.home);
      return matchPaths(expanded)[0] ?? null;
    } catch (err) {
      this.logger?.debug(`Detection path "${pattern}" could not be checked: ${errorMessage(err)}`);
      return null;
    }
  }
}

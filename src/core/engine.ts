import type { AppDescriptor } from '../types/descriptor.js';
import type {
  InstallOutcome,
  ProvisionReport,
  ProvisionState,
  TransitionListener,
} from '../types/provision.js';
import { dispatch, type AdapterSet } from './adapters/index.js';
import type { Detector } from './detector.js';
import { describeInstallError, errorMessage } from './errors.js';
import type { ComponentLogger, Logger } from './logger.js';
import { summarize } from './reporter.js';

export const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

export interface ProvisionEngineOptions {
  detector: Detector;
  adapters: AdapterSet;
  logger: Logger;
  /** Per-item bound on adapter calls unless the descriptor sets its own. */
  timeoutMs?: number;
  onTransition?: TransitionListener;
  now?: () => number;
}

/**
 * Runs descriptors one at a time, in the order given:
 * detect, install when absent, re-detect to verify. A failing item is
 * recorded and the run moves on; `run` itself never rejects.
 */
export class ProvisionEngine {
  private readonly detector: Detector;
  private readonly adapters: AdapterSet;
  private readonly log: ComponentLogger;
  private readonly adapterLog: ComponentLogger;
  private readonly timeoutMs: number;
  private readonly onTransition?: TransitionListener;
  private readonly now: () => number;

  constructor(options: ProvisionEngineOptions) {
    this.detector = options.detector;
    this.adapters = options.adapters;
    this.log = options.logger.child('Engine');
    this.adapterLog = options.logger.child('Installer');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.onTransition = options.onTransition;
    this.now = options.now ?? Date.now;
  }

  async run(descriptors: readonly AppDescriptor[]): Promise<ProvisionReport> {
    this.log.info(`Provisioning ${descriptors.length} application(s)`);

    const outcomes: InstallOutcome[] = [];
    for (const descriptor of descriptors) {
      outcomes.push(await this.provision(descriptor));
    }

    const report = summarize(outcomes);
    this.log.info(`Finished: ${report.succeeded}/${report.total} succeeded`);
    return report;
  }

  private async provision(descriptor: AppDescriptor): Promise<InstallOutcome> {
    const started = this.now();
    const finish = (fields: Omit<InstallOutcome, 'name' | 'durationMs'>): InstallOutcome => {
      this.transition(descriptor, fields.status);
      return { name: descriptor.name, ...fields, durationMs: this.now() - started };
    };

    try {
      this.transition(descriptor, 'pending');
      this.transition(descriptor, 'detecting');

      const detection = await this.detector.detect(descriptor);
      if (detection.found) {
        this.log.info(`${descriptor.name} is already installed (${detection.method})`);
        return finish({
          status: 'already-present',
          succeeded: true,
          detectionMethod: detection.method,
          matchedPath: detection.matchedPath,
        });
      }

      this.transition(descriptor, 'installing');
      this.log.info(`Installing ${descriptor.name} via ${descriptor.installMethod}`);

      const timeoutMs = descriptor.timeoutSeconds
        ? descriptor.timeoutSeconds * 1000
        : this.timeoutMs;
      const result = await dispatch(this.adapters, descriptor, {
        timeoutMs,
        logger: this.adapterLog,
      });

      if (!result.ok) {
        const detail = describeInstallError(result.error);
        this.log.error(`Failed to install ${descriptor.name}: ${detail}`);
        return finish({ status: 'failed', succeeded: false, errorDetail: detail });
      }

      const verification = await this.detector.detect(descriptor);
      if (verification.found) {
        this.log.info(`${descriptor.name} installed and verified (${verification.method})`);
        return finish({
          status: 'verified',
          succeeded: true,
          detectionMethod: verification.method,
          matchedPath: verification.matchedPath,
        });
      }

      // Counts as a success
      this.log.warn(
        `${descriptor.name}: installer reported success but it was not detected afterwards`,
      );
      return finish({ status: 'unverified', succeeded: true });
    } catch (err) {
      const detail = `unexpected error: ${errorMessage(err)}`;
      this.log.error(`Failed to process ${descriptor.name}: ${detail}`);
      return finish({ status: 'failed', succeeded: false, errorDetail: detail });
    }
  }

  private transition(descriptor: AppDescriptor, state: ProvisionState): void {
    this.log.debug(`${descriptor.name}: ${state}`);
    this.onTransition?.(descriptor, state);
  }
}

import type { RunConfig } from '../config/resolve.js';
import { fetchDownloader, type Downloader } from '../utils/download.js';
import { expandPath } from '../utils/paths.js';
import { spawnRunner, type ProcessRunner } from '../utils/process.js';
import { createAdapters, type DefaultAdapters } from './adapters/index.js';
import { Detector } from './detector.js';
import { ProvisionEngine } from './engine.js';
import { Logger, consoleSink, fileSink, type LogSink } from './logger.js';
import { CommandProbe } from './probe.js';

export interface Runtime {
  config: RunConfig;
  logger: Logger;
  probe: CommandProbe;
  adapters: DefaultAdapters;
  detector: Detector;
  engine: ProvisionEngine;
}

export interface RuntimeOverrides {
  runner?: ProcessRunner;
  downloader?: Downloader;
  sinks?: LogSink[];
}

/** Builds the object graph a command needs from resolved configuration. */
export function createRuntime(config: RunConfig, overrides: RuntimeOverrides = {}): Runtime {
  const sinks = overrides.sinks ?? [
    consoleSink(process.stdout.isTTY === true),
    ...(config.logFile ? [fileSink(expandPath(config.logFile))] : []),
  ];
  const logger = new Logger({ threshold: config.logLevel, sinks });

  const probe = new CommandProbe({ extraPaths: config.extraPaths.map((p) => expandPath(p)) });
  const adapters = createAdapters({
    runner: overrides.runner ?? spawnRunner,
    probe,
    downloader: overrides.downloader ?? fetchDownloader,
    scratchDir: expandPath(config.scratchDir),
  });

  const detector = new Detector({
    probe,
    packageManagers: { scoop: adapters.scoop, winget: adapters.winget },
    logger: logger.child('Detector'),
  });

  const engine = new ProvisionEngine({
    detector,
    adapters,
    logger,
    timeoutMs: config.timeoutMs,
  });

  return { config, logger, probe, adapters, detector, engine };
}

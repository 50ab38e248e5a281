import type { InstallError } from '../types/provision.js';

/** The catalog could not be read or failed validation. */
export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}

/** A setting or command-line value is invalid. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(1)}s`;
}

export function describeInstallError(error: InstallError): string {
  switch (error.kind) {
    case 'backend-failure':
      return error.detail
        ? `installer exited with code ${error.exitCode}: ${error.detail}`
        : `installer exited with code ${error.exitCode}`;
    case 'download-failure':
      return `download failed: ${error.cause}`;
    case 'timeout':
      return `timed out after ${formatSeconds(error.timeoutMs)}`;
    case 'unavailable':
      return `${error.tool} is not available on this system`;
  }
}

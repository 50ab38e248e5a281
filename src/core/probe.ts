import { statSync, accessSync, constants } from 'node:fs';
import { delimiter, join, isAbsolute, extname } from 'node:path';

export interface CommandProbeOptions {
  /** Search path entries; defaults to the PATH of the current process. */
  searchPath?: string[];
  /** Directories searched after `searchPath`, e.g. a package manager's shim dir. */
  extraPaths?: string[];
  /** Executable extensions tried on Windows; defaults to PATHEXT. */
  pathExt?: string[];
  platform?: NodeJS.Platform;
}

const DEFAULT_PATHEXT = ['.COM', '.EXE', '.BAT', '.CMD'];

function splitPath(value: string | undefined, sep: string): string[] {
  return (value ?? '').split(sep).filter((entry) => entry.length > 0);
}

/**
 * Resolves executables the way the host shell would, from an explicit
 * search path. Never mutates the process environment.
 */
export class CommandProbe {
  private readonly dirs: string[];
  private readonly pathExt: string[];
  private readonly windows: boolean;

  constructor(options: CommandProbeOptions = {}) {
    this.windows = (options.platform ?? process.platform) === 'win32';
    const sep = this.windows ? ';' : delimiter;
    const searchPath = options.searchPath ?? splitPath(process.env.PATH ?? process.env.Path, sep);
    this.dirs = [...searchPath, ...(options.extraPaths ?? [])];
    this.pathExt = this.windows
      ? (options.pathExt ?? (splitPath(process.env.PATHEXT, ';').length > 0
          ? splitPath(process.env.PATHEXT, ';')
          : DEFAULT_PATHEXT))
      : [];
  }

  isAvailable(name: string): boolean {
    return this.resolve(name) !== null;
  }

  /** Full path of the first matching executable, or null. */
  resolve(name: string): string | null {
    try {
      if (!name) return null;

      if (isAbsolute(name) || name.includes('/') || name.includes('\\')) {
        return this.candidates(name).find((c) => this.isExecutable(c)) ?? null;
      }

      for (const dir of this.dirs) {
        const found = this.candidates(join(dir, name)).find((c) => this.isExecutable(c));
        if (found) return found;
      }
      return null;
    } catch {
      return null;
    }
  }

  private candidates(base: string): string[] {
    if (!this.windows || extname(base) !== '') return [base];
    return [base, ...this.pathExt.map((ext) => base + ext.toLowerCase())];
  }

  private isExecutable(path: string): boolean {
    try {
      if (!statSync(path).isFile()) return false;
      if (this.windows) {
        const ext = extname(path).toLowerCase();
        return this.pathExt.some((candidate) => candidate.toLowerCase() === ext);
      }
      accessSync(path, constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }
}

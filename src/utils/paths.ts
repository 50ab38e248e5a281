import { existsSync, readdirSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, normalize } from 'node:path';
import micromatch from 'micromatch';

const isWindows = process.platform === 'win32';

type Env = Record<string, string | undefined>;

function lookupEnv(env: Env, name: string): string | undefined {
  if (env[name] !== undefined) return env[name];
  // Windows environment names are case-insensitive
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(env)) {
    if (key.toLowerCase() === lower) return value;
  }
  return undefined;
}

/**
 * Expands a leading `~`, `%VAR%` and `$VAR` / `${VAR}` references.
 * Unknown variables are left as written.
 */
export function expandPath(input: string, env: Env = process.env, home: string = homedir()): string {
  let out = input;
  if (out === '~' || out.startsWith('~/') || out.startsWith('~\\')) {
    out = home + out.slice(1);
  }
  out = out.replace(/%([A-Za-z_][A-Za-z0-9_()]*)%/g, (match: string, name: string) =>
    lookupEnv(env, name) ?? match,
  );
  out = out.replace(
    /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (match: string, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare;
      return name ? (lookupEnv(env, name) ?? match) : match;
    },
  );
  return out;
}

export function isGlobSegment(segment: string): boolean {
  return micromatch.scan(segment).isGlob;
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function listDir(dir: string): string[] {
  try {
    return readdirSync(dir);
  } catch {
    return [];
  }
}

function walk(dir: string, segments: string[], results: Set<string>): void {
  if (segments.length === 0) {
    results.add(dir);
    return;
  }

  const [segment, ...rest] = segments;

  if (segment === '**') {
    walk(dir, rest, results);
    for (const name of listDir(dir)) {
      const child = join(dir, name);
      if (isDirectory(child)) walk(child, segments, results);
    }
    return;
  }

  if (isGlobSegment(segment)) {
    for (const name of listDir(dir)) {
      if (!micromatch.isMatch(name, segment, { dot: true, nocase: isWindows })) continue;
      const child = join(dir, name);
      if (rest.length === 0) {
        results.add(child);
      } else if (isDirectory(child)) {
        walk(child, rest, results);
      }
    }
    return;
  }

  const next = join(dir, segment);
  if (existsSync(next)) walk(next, rest, results);
}

/**
 * Returns every existing filesystem entry matching `pattern`. Plain paths
 * yield themselves when they exist; wildcard segments are expanded against
 * the directory tree, `**` spanning any depth.
 */
export function matchPaths(pattern: string): string[] {
  const posix = pattern.replace(/\\/g, '/');
  const segments = posix.split('/');
  const firstGlob = segments.findIndex((s) => s === '**' || isGlobSegment(s));

  if (firstGlob === -1) {
    return existsSync(pattern) ? [normalize(pattern)] : [];
  }

  let base = segments.slice(0, firstGlob).join('/');
  if (base === '') base = posix.startsWith('/') ? '/' : '.';
  // "C:" alone means the current directory on that drive
  if (/^[A-Za-z]:$/.test(base)) base += '/';

  const results = new Set<string>();
  walk(base, segments.slice(firstGlob).filter((s) => s !== ''), results);
  return [...results].sort();
}

import { mkdirSync, statSync } from 'node:fs';

export function ensureDir(path: string): void {
  mkdirSync(path, { recursive: true });
}

export function fileExists(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

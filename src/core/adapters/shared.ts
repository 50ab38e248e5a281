import type { ProcessResult } from '../../utils/process.js';
import { okResult, errResult } from '../../utils/result.js';
import type { InstallResult } from './types.js';

function lastLine(text: string): string | undefined {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines.at(-1);
}

/** Exit code 0 is success; everything else becomes an install error. */
export function mapProcessResult(result: ProcessResult, timeoutMs: number): InstallResult {
  if (result.timedOut) {
    return errResult({ kind: 'timeout', timeoutMs });
  }
  if (result.spawnError) {
    return errResult({
      kind: 'backend-failure',
      exitCode: result.exitCode,
      detail: result.spawnError,
    });
  }
  if (result.exitCode !== 0) {
    return errResult({
      kind: 'backend-failure',
      exitCode: result.exitCode,
      detail: lastLine(result.stderr),
    });
  }
  return okResult(undefined);
}

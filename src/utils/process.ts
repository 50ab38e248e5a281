import { spawn, type ChildProcess } from 'node:child_process';

export interface ProcessResult {
  /** Exit code; 124 when killed by timeout, 127 when the process could not start. */
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Set when the process could not be spawned at all. */
  spawnError?: string;
  durationMs: number;
}

export interface RunOptions {
  /** 0 disables the timeout. */
  timeoutMs: number;
  /** Run `command` through the platform shell instead of as an argv. */
  shell?: boolean;
}

/**
 * Single seam through which every subprocess is started, so adapters can be
 * exercised against a fake runner.
 */
export interface ProcessRunner {
  run(command: string, args: string[], options: RunOptions): Promise<ProcessResult>;
}

const KILL_GRACE_MS = 1000;
const isWindows = process.platform === 'win32';
const TIMEOUT_EXIT_CODE = 124;
const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * Signals the child and everything it started. On POSIX the child leads its
 * own process group; on Windows `taskkill /T` walks the tree.
 */
function killTree(child: ChildProcess, signal: NodeJS.Signals): void {
  const { pid } = child;
  if (pid === undefined) return;

  if (isWindows) {
    const killer = spawn('taskkill', ['/pid', String(pid), '/T', '/F'], {
      stdio: 'ignore',
      windowsHide: true,
    });
    killer.on('error', () => child.kill(signal));
    return;
  }

  try {
    process.kill(-pid, signal);
  } catch {
    // Group already gone
  }
}

/**
 * Spawns a process, captures its output and enforces the timeout
 * (SIGTERM to the whole process tree first, SIGKILL after a short grace period).
 */
export function runProcess(
  command: string,
  args: string[],
  options: RunOptions,
): Promise<ProcessResult> {
  const startTime = Date.now();
  let stdout = '';
  let stderr = '';

  return new Promise<ProcessResult>((resolve) => {
    let timeoutId: NodeJS.Timeout | null = null;
    let settled = false;
    let child: ChildProcess;

    const finish = (result: Omit<ProcessResult, 'stdout' | 'stderr' | 'durationMs'>) => {
      if (settled) return;
      settled = true;
      if (timeoutId) clearTimeout(timeoutId);
      resolve({ ...result, stdout, stderr, durationMs: Date.now() - startTime });
    };

    try {
      child = spawn(command, args, {
        shell: options.shell ?? false,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: !isWindows,
        windowsHide: true,
      });
    } catch (error) {
      finish({
        exitCode: SPAWN_FAILURE_EXIT_CODE,
        timedOut: false,
        spawnError: error instanceof Error ? error.message : String(error),
      });
      return;
    }

    if (options.timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        killTree(child, 'SIGTERM');
        // The shell may exit before its children, so the group is killed regardless
        const forceKill = setTimeout(() => killTree(child, 'SIGKILL'), KILL_GRACE_MS);
        forceKill.unref();
        finish({ exitCode: TIMEOUT_EXIT_CODE, timedOut: true });
      }, options.timeoutMs);
    }

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error: Error) => {
      finish({ exitCode: SPAWN_FAILURE_EXIT_CODE, timedOut: false, spawnError: error.message });
    });

    child.on('close', (code: number | null) => {
      finish({ exitCode: code ?? 1, timedOut: false });
    });
  });
}

export const spawnRunner: ProcessRunner = { run: runProcess };

/**
 * Splits an argument string on whitespace, keeping double- or single-quoted
 * segments together (quotes are removed).
 */
export function splitArgs(input: string | readonly string[]): string[] {
  if (typeof input !== 'string') return [...input];

  const args: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;
  let inToken = false;

  for (const ch of input) {
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else {
        current += ch;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) {
        args.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += ch;
      inToken = true;
    }
  }
  if (inToken) args.push(current);
  return args;
}

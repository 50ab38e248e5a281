import type { AppDescriptor } from './descriptor.js';

// ── Detection ───────────────────────────────────────────────────────

export type DetectionMethod = 'filesystem path' | 'command probe' | 'package listing';

export interface DetectionResult {
  found: boolean;
  method?: DetectionMethod;
  /** Concrete path that satisfied a detection pattern. */
  matchedPath?: string;
}

// ── Install errors ──────────────────────────────────────────────────

export type InstallError =
  | { kind: 'backend-failure'; exitCode: number; detail?: string }
  | { kind: 'download-failure'; cause: string }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'unavailable'; tool: string };

// ── Engine state ────────────────────────────────────────────────────

export type ProvisionState =
  | 'pending'
  | 'detecting'
  | 'already-present'
  | 'installing'
  | 'verified'
  | 'unverified'
  | 'failed';

export type OutcomeStatus = Extract<
  ProvisionState,
  'already-present' | 'verified' | 'unverified' | 'failed'
>;

export interface InstallOutcome {
  name: string;
  status: OutcomeStatus;
  succeeded: boolean;
  detectionMethod?: DetectionMethod;
  matchedPath?: string;
  errorDetail?: string;
  durationMs: number;
}

export interface ProvisionFailure {
  name: string;
  errorDetail: string;
}

export interface ProvisionReport {
  total: number;
  succeeded: number;
  alreadyPresent: number;
  installed: number;
  unverified: number;
  failures: ProvisionFailure[];
  outcomes: InstallOutcome[];
}

export type TransitionListener = (
  descriptor: AppDescriptor,
  state: ProvisionState,
) => void;

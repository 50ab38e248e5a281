import { describe, it, expect } from 'vitest';
import { render, summarize } from '../../../src/core/reporter.js';
import type { InstallOutcome } from '../../../src/types/provision.js';

const present: InstallOutcome = {
  name: 'Git',
  status: 'already-present',
  succeeded: true,
  detectionMethod: 'command probe',
  durationMs: 3,
};
const installed: InstallOutcome = {
  name: 'Tool',
  status: 'verified',
  succeeded: true,
  detectionMethod: 'filesystem path',
  durationMs: 10,
};
const failed: InstallOutcome = {
  name: 'Broken',
  status: 'failed',
  succeeded: false,
  errorDetail: 'installer exited with code 1',
  durationMs: 5,
};

describe('summarize', () => {
  it('counts outcomes by status', () => {
    const report = summarize([present, installed, failed]);
    expect(report).toMatchObject({
      total: 3,
      succeeded: 2,
      alreadyPresent: 1,
      installed: 1,
      unverified: 0,
      failures: [{ name: 'Broken', errorDetail: 'installer exited with code 1' }],
    });
  });

  it('handles an empty run', () => {
    expect(summarize([])).toEqual({
      total: 0,
      succeeded: 0,
      alreadyPresent: 0,
      installed: 0,
      unverified: 0,
      failures: [],
      outcomes: [],
    });
  });
});

describe('render', () => {
  it('lists failures and ends with a warning banner', () => {
    const text = render(summarize([present, installed, failed]));
    expect(text.split('\n')).toEqual([
      'Provisioned 2/3 application(s): 1 already present, 1 installed, 0 unverified.',
      '',
      'Failures:',
      '  - Broken: installer exited with code 1',
      '',
      'WARNING: 1 application(s) failed. Review the error lines in the log above for details.',
    ]);
  });

  it('does not show next steps when something failed', () => {
    const text = render(summarize([failed]), { nextSteps: ['Restart'] });
    expect(text).not.toContain('Next steps:');
  });

  it('numbers next steps and fills in the email', () => {
    const text = render(summarize([present, installed]), {
      nextSteps: ['Open a new terminal.', 'git config --global user.email "{{email}}"'],
      email: 'dev@example.test',
    });
    expect(text.split('\n')).toEqual([
      'Provisioned 2/2 application(s): 1 already present, 1 installed, 0 unverified.',
      '',
      'Next steps:',
      '  1. Open a new terminal.',
      '  2. git config --global user.email "dev@example.test"',
    ]);
  });

  it('uses a placeholder when no email is given', () => {
    const text = render(summarize([installed]), { nextSteps: ['ssh-keygen -C "{{email}}"'] });
    expect(text.split('\n').at(-1)).toBe('  1. ssh-keygen -C "<your-email>"');
  });

  it('confirms completion when there are no next steps', () => {
    const text = render(summarize([present]));
    expect(text.split('\n').at(-1)).toBe('All applications are in place.');
  });

  it('calls out unverified installs', () => {
    const unverified: InstallOutcome = { name: 'Docker', status: 'unverified', succeeded: true, durationMs: 1 };
    const text = render(summarize([unverified]));
    expect(text.split('\n')).toEqual([
      'Provisioned 1/1 application(s): 0 already present, 0 installed, 1 unverified.',
      '',
      'Installed but not detected afterwards (may need a new shell or a restart):',
      '  - Docker',
      '',
      'All applications are in place.',
    ]);
  });
});

import Handlebars from 'handlebars';
import type { InstallOutcome, ProvisionReport } from '../types/provision.js';

export function summarize(outcomes: readonly InstallOutcome[]): ProvisionReport {
  const report: ProvisionReport = {
    total: outcomes.length,
    succeeded: 0,
    alreadyPresent: 0,
    installed: 0,
    unverified: 0,
    failures: [],
    outcomes: [...outcomes],
  };

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'already-present':
        report.alreadyPresent++;
        break;
      case 'verified':
        report.installed++;
        break;
      case 'unverified':
        report.unverified++;
        break;
      case 'failed':
        report.failures.push({
          name: outcome.name,
          errorDetail: outcome.errorDetail ?? 'unknown error',
        });
        break;
    }
    if (outcome.succeeded) report.succeeded++;
  }

  return report;
}

export interface RenderOptions {
  /** Lines shown when every item succeeded; `{{email}}` is substituted. */
  nextSteps?: readonly string[];
  email?: string;
}

const EMAIL_PLACEHOLDER = '<your-email>';

function renderStep(step: string, email: string): string {
  return Handlebars.compile(step, { noEscape: true })({ email });
}

export function render(report: ProvisionReport, options: RenderOptions = {}): string {
  const lines: string[] = [];

  lines.push(
    `Provisioned ${report.succeeded}/${report.total} application(s): ` +
      `${report.alreadyPresent} already present, ${report.installed} installed, ` +
      `${report.unverified} unverified.`,
  );

  const unverified = report.outcomes.filter((o) => o.status === 'unverified');
  if (unverified.length > 0) {
    lines.push('');
    lines.push('Installed but not detected afterwards (may need a new shell or a restart):');
    for (const outcome of unverified) {
      lines.push(`  - ${outcome.name}`);
    }
  }

  if (report.failures.length > 0) {
    lines.push('');
    lines.push('Failures:');
    for (const failure of report.failures) {
      lines.push(`  - ${failure.name}: ${failure.errorDetail}`);
    }
  }

  lines.push('');
  if (report.succeeded === report.total) {
    const steps = options.nextSteps ?? [];
    if (steps.length === 0) {
      lines.push('All applications are in place.');
    } else {
      const email = options.email ?? EMAIL_PLACEHOLDER;
      lines.push('Next steps:');
      steps.forEach((step, index) => {
        lines.push(`  ${index + 1}. ${renderStep(step, email)}`);
      });
    }
  } else {
    lines.push(
      `WARNING: ${report.failures.length} application(s) failed. ` +
        'Review the error lines in the log above for details.',
    );
  }

  return lines.join('\n');
}

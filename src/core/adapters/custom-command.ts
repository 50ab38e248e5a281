import type { CustomDescriptor } from '../../types/descriptor.js';
import type { ProcessRunner } from '../../utils/process.js';
import { mapProcessResult } from './shared.js';
import type { BackendAdapter, InstallContext, InstallResult } from './types.js';

/** Runs the descriptor's command line through the platform shell. */
export class CustomCommandAdapter implements BackendAdapter<CustomDescriptor> {
  constructor(private readonly runner: ProcessRunner) {}

  async install(descriptor: CustomDescriptor, context: InstallContext): Promise<InstallResult> {
    context.logger.debug(`Running: ${descriptor.command}`);
    const result = await this.runner.run(descriptor.command, [], {
      timeoutMs: context.timeoutMs,
      shell: true,
    });
    return mapProcessResult(result, context.timeoutMs);
  }
}

import type { ComponentLogger } from '../logger.js';
import type { AppDescriptor } from '../../types/descriptor.js';
import type { InstallError } from '../../types/provision.js';
import type { Result } from '../../utils/result.js';

export interface InstallContext {
  timeoutMs: number;
  logger: ComponentLogger;
}

export type InstallResult = Result<void, InstallError>;

/**
 * One installation technique. Implementations report every failure through
 * the returned result and never throw.
 */
export interface BackendAdapter<D extends AppDescriptor = AppDescriptor> {
  install(descriptor: D, context: InstallContext): Promise<InstallResult>;
}

type DescriptorFor<M extends AppDescriptor['installMethod']> = Extract<
  AppDescriptor,
  { installMethod: M }
>;

export type AdapterSet = {
  [M in AppDescriptor['installMethod']]: BackendAdapter<DescriptorFor<M>>;
};

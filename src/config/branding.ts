export const APP_NAME = 'rigup';
export const DISPLAY_NAME = 'Rigup';
export const DESCRIPTION = 'Declarative workstation provisioning';
export const HOME_DIR = '.rigup';
export const ENV_PREFIX = 'RIGUP';

export function envVar(suffix: string): string {
  return `${ENV_PREFIX}_${suffix.toUpperCase()}`;
}

import { confirm } from '@inquirer/prompts';

/** Asks a yes/no question; without a terminal the default answer is used. */
export async function askConfirm(message: string, defaultValue = true): Promise<boolean> {
  if (!process.stdin.isTTY) return defaultValue;
  return confirm({ message, default: defaultValue });
}

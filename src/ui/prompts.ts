import { confirm } from '@inquirer/prompts';

export async function confirmAction(message: string, defaultValue = true): Promise<boolean> {
  return confirm({ message, default: defaultValue });
}

/**
 * Ask before replacing an existing file. Defaults to no.
 */
export async function confirmOverwrite(path: string): Promise<boolean> {
  return confirm({ message: `Overwrite ${path}?`, default: false });
}

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse } from 'dotenv';

export function readEnvFile(filePath: string): Record<string, string> {
  if (!existsSync(filePath)) return {};
  return parse(readFileSync(filePath, 'utf-8'));
}

/**
 * Read env files from a directory and merge them. Later files win.
 */
export function loadEnvFiles(dir: string, files: readonly string[]): Record<string, string> {
  let merged: Record<string, string> = {};
  for (const file of files) {
    const vars = readEnvFile(join(dir, file));
    merged = { ...merged, ...vars };
  }
  return merged;
}

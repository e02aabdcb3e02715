import { readFileSync, writeFileSync, existsSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { STEP_NAMES, type StepName } from './step-names.js';

export interface CommandSpec {
  command: string;
  args: string[];
  env?: Record<string, string>;
  /** Relative to the working directory. */
  cwd?: string;
  timeoutMs?: number;
}

export interface BootstrapConfig {
  version: number;
  environment?: string;
  envFiles: string[];
  steps: Record<StepName, CommandSpec>;
}

const CONFIG_FILENAME = '.bootstrap.json';

const commandOverrideSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()),
    env: z.record(z.string()),
    cwd: z.string().min(1),
    timeoutMs: z.number().int().positive(),
  })
  .partial()
  .strict();

const stepsSchema = z
  .object({
    install: commandOverrideSchema,
    'collect-assets': commandOverrideSchema,
    migrate: commandOverrideSchema,
    'init-platform-settings': commandOverrideSchema,
    'init-referral-settings': commandOverrideSchema,
  })
  .partial()
  .strict();

const configFileSchema = z
  .object({
    version: z.literal(1).default(1),
    environment: z.string().min(1).optional(),
    envFiles: z.array(z.string().min(1)).optional(),
    steps: stepsSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function getConfigPath(dir: string = process.cwd()): string {
  return join(dir, CONFIG_FILENAME);
}

export function configExists(dir: string = process.cwd()): boolean {
  return existsSync(getConfigPath(dir));
}

export function defaultConfig(): BootstrapConfig {
  return {
    version: 1,
    envFiles: ['.env', '.env.local'],
    steps: {
      install: { command: 'npm', args: ['ci'] },
      'collect-assets': { command: 'npm', args: ['run', 'assets:collect'] },
      migrate: { command: 'npm', args: ['run', 'db:migrate'] },
      'init-platform-settings': { command: 'npm', args: ['run', 'settings:init-platform'] },
      'init-referral-settings': { command: 'npm', args: ['run', 'settings:init-referral'] },
    },
  };
}

/**
 * Load `.bootstrap.json` from `dir`, merged over the defaults.
 * A missing file means defaults; an unreadable or invalid one is a ConfigError.
 */
export function loadConfig(dir: string = process.cwd()): BootstrapConfig {
  const configPath = getConfigPath(dir);
  if (!existsSync(configPath)) {
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(configPath, `could not parse JSON (${reason})`);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(configPath, formatIssues(parsed.error));
  }

  return mergeConfig(defaultConfig(), parsed.data);
}

export function mergeConfig(base: BootstrapConfig, file: ConfigFile): BootstrapConfig {
  const steps = { ...base.steps };
  for (const name of STEP_NAMES) {
    const override = file.steps?.[name];
    if (override) {
      steps[name] = { ...steps[name], ...override };
    }
  }

  return {
    version: file.version,
    environment: file.environment ?? base.environment,
    envFiles: file.envFiles ?? base.envFiles,
    steps,
  };
}

export function saveConfig(config: BootstrapConfig, dir: string = process.cwd()): void {
  writeFileSync(getConfigPath(dir), JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

import { loadEnvFiles } from './env.js';
import type { BootstrapConfig } from './config.js';

export type OutputMode = 'stream' | 'capture';

/**
 * Everything a step needs from its surroundings, resolved once per run
 * and passed in explicitly.
 */
export interface ExecutionContext {
  cwd: string;
  environment: string;
  env: Record<string, string>;
  output: OutputMode;
}

export interface ContextOptions {
  cwd?: string;
  output?: OutputMode;
  processEnv?: NodeJS.ProcessEnv;
}

/**
 * Resolve the target environment name.
 *
 * Priority:
 *   1. `environment` in the config file
 *   2. BOOTSTRAP_ENV
 *   3. NODE_ENV
 *   4. production
 */
export function resolveEnvironment(config: BootstrapConfig, processEnv: NodeJS.ProcessEnv): string {
  return config.environment ?? processEnv.BOOTSTRAP_ENV ?? processEnv.NODE_ENV ?? 'production';
}

export function createContext(config: BootstrapConfig, options: ContextOptions = {}): ExecutionContext {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const environment = resolveEnvironment(config, processEnv);

  const inherited: Record<string, string> = {};
  for (const [key, value] of Object.entries(processEnv)) {
    if (value !== undefined) inherited[key] = value;
  }

  return {
    cwd,
    environment,
    env: {
      ...inherited,
      ...loadEnvFiles(cwd, config.envFiles),
      BOOTSTRAP_ENV: environment,
    },
    output: options.output ?? 'stream',
  };
}

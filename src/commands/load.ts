import { loadConfig, type BootstrapConfig } from '../core/config.js';
import { ConfigError } from '../core/errors.js';
import { error, info } from '../ui/format.js';

export const CONFIG_ERROR_EXIT_CODE = 2;

/**
 * Load configuration for a command. A ConfigError is reported and
 * yields null; anything else propagates.
 */
export function loadConfigOrReport(cwd: string): BootstrapConfig | null {
  try {
    return loadConfig(cwd);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.log(error('Invalid configuration'));
      console.log(info(err.message));
      console.log('');
      return null;
    }
    throw err;
  }
}

import 'dotenv/config';
import { ConfigSchema, type Config } from './schema';
import { ConfigurationError } from '../utils/errors';

let _config: Config | null = null;

/** Parse and validate the driver's environment variables. Throws on validation failure. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (_config) return _config;

  const result = ConfigSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigurationError(`Configuration error:\n${issues}`);
  }

  _config = result.data;
  return result.data;
}

/** Reset cached config (for testing). */
export function resetConfig(): void {
  _config = null;
}

/**
 * Shared Configuration Package
 *
 * Environment variable validation and configuration utilities.
 *
 * @example
 * ```typescript
 * import { loadConfig } from '@config';
 *
 * // Validate at startup
 * const config = loadConfig();
 * const client = createElasticsearchBackend(config.elasticsearch);
 * ```
 *
 * @module @config
 */

export { envConfig } from './environment';

export {
  envSchema,
  loadConfig,
  ConfigValidationError,
  type EnvConfig,
  type AppConfig,
  type RefreshPolicy,
} from './schema';

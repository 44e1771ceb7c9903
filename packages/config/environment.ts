/**
 * Environment Configuration
 *
 * Values read on every access so test suites can switch them between cases.
 */

export const envConfig = {
  /** Current environment */
  get nodeEnv() { return process.env['NODE_ENV'] || 'development'; },

  /** Application version, reported in the OpenAPI document */
  get version() { return process.env['APP_VERSION'] || '1.0.0'; },
} as const;

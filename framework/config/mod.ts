/**
 * Configuration
 *
 * Defaults, a JSON file and environment variables, merged in that order.
 */

export { Config, loadConfig, configFromEnv, getConfig, setConfig, type ConfigOptions } from './config.ts';

import { ValidationError } from '../backtest/errors.js';
import { createLogger } from '../utils/logger.js';
import { CONFIG_DEFAULTS } from './defaults.js';
import { validateConfigValue } from './schema-validator.js';

const log = createLogger('config');

/**
 * Layered configuration: environment variable, then a runtime override set
 * through `set()`, then the built-in default.
 */
export class ConfigManager {
  private overrides = new Map<string, unknown>();

  get<T>(key: string): T {
    const envOverride = this.getEnvOverride(key);
    if (envOverride !== undefined) {
      this.assertValid(key, envOverride, this.configKeyToEnvVar(key));
      return envOverride as T;
    }

    if (this.overrides.has(key)) {
      return this.overrides.get(key) as T;
    }

    const def = CONFIG_DEFAULTS.find((d) => d.key === key);
    if (def) {
      return JSON.parse(def.value) as T;
    }

    throw new Error(`Config key not found: ${key}`);
  }

  set(key: string, value: unknown): void {
    this.assertValid(key, value, key);
    this.overrides.set(key, value);
    log.info({ key, value }, 'Config updated');
  }

  /** Drop runtime overrides for one key, or all of them. */
  reset(key?: string): void {
    if (key) {
      this.overrides.delete(key);
    } else {
      this.overrides.clear();
    }
  }

  private assertValid(key: string, value: unknown, source: string): void {
    const { valid, error } = validateConfigValue(key, value);
    if (!valid) {
      throw new ValidationError(`Invalid value for ${source}: ${error}`);
    }
  }

  /**
   * Converts a config key to an environment variable name.
   * e.g. "backtest.initialCapital" → "BACKTEST_INITIAL_CAPITAL"
   *      "strategy.topN" → "STRATEGY_TOP_N"
   */
  configKeyToEnvVar(key: string): string {
    return key
      .replace(/\./g, '_')
      .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
      .toUpperCase();
  }

  /**
   * Values are parsed as JSON when possible, otherwise used as raw strings,
   * so `BACKTEST_START_DATE=2024-01-02` and `STRATEGY_TOP_N=5` both work.
   */
  private getEnvOverride(key: string): unknown {
    const envValue = process.env[this.configKeyToEnvVar(key)];
    if (envValue === undefined) return undefined;

    try {
      return JSON.parse(envValue);
    } catch {
      return envValue;
    }
  }
}

export const configManager = new ConfigManager();

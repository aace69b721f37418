import { Logger } from './logger';

/**
 * Anything that can answer a settings lookup by key.
 */
export interface SettingsSource {
  get(key: string): unknown;
}

/**
 * Layered source: the first layer holding a non-null value wins.
 */
export class LayeredSettingsSource implements SettingsSource {
  constructor(private readonly layers: SettingsSource[]) { }

  get(key: string): unknown {
    for (const layer of this.layers) {
      const value = layer.get(key);
      if (value !== null && value !== undefined) {
        return value;
      }
    }
    return undefined;
  }
}

export class ObjectSettingsSource implements SettingsSource {
  constructor(private readonly values: Record<string, unknown>) { }

  get(key: string): unknown {
    return Object.prototype.hasOwnProperty.call(this.values, key) ? this.values[key] : undefined;
  }
}

/**
 * Reads `HEATPUMP_<UPPER_SNAKE>` variables, e.g. cycleIntervalMinutes from
 * HEATPUMP_CYCLE_INTERVAL_MINUTES.
 */
export class EnvSettingsSource implements SettingsSource {
  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly prefix: string = 'HEATPUMP_'
  ) { }

  static toEnvKey(key: string, prefix: string = 'HEATPUMP_'): string {
    return prefix + key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase();
  }

  get(key: string): unknown {
    return this.env[EnvSettingsSource.toEnvKey(key, this.prefix)];
  }
}

/**
 * Type-safe settings accessor with validation and defaults.
 */
export class SettingsAccessor {
  constructor(
    private readonly source: SettingsSource,
    private readonly logger?: Pick<Logger, 'warn' | 'debug'>
  ) { }

  /**
   * Get number setting with optional range validation and type coercion.
   */
  getNumber(
    key: string,
    defaultValue: number,
    options?: { min?: number; max?: number }
  ): number {
    const rawValue = this.source.get(key);

    if (rawValue === null || rawValue === undefined) {
      return defaultValue;
    }

    if (typeof rawValue === 'number') {
      return this.validateNumberRange(rawValue, defaultValue, options, key);
    }

    // Environment values always arrive as strings
    if (typeof rawValue === 'string') {
      const parsed = Number(rawValue);
      if (rawValue.trim() !== '' && Number.isFinite(parsed)) {
        this.logDebug(`Setting '${key}' coerced from string "${rawValue}" to number ${parsed}`);
        return this.validateNumberRange(parsed, defaultValue, options, key);
      }
    }

    this.logWarning(
      `Setting '${key}' has invalid type: expected number, got ${typeof rawValue}. Using default.`
    );
    return defaultValue;
  }

  /**
   * Get boolean setting with type coercion.
   */
  getBoolean(key: string, defaultValue: boolean): boolean {
    const rawValue = this.source.get(key);

    if (rawValue === null || rawValue === undefined) {
      return defaultValue;
    }

    if (typeof rawValue === 'boolean') {
      return rawValue;
    }

    if (typeof rawValue === 'string') {
      const lower = rawValue.toLowerCase().trim();
      if (lower === 'true' || lower === '1') {
        return true;
      }
      if (lower === 'false' || lower === '0' || lower === '') {
        return false;
      }
    }

    if (typeof rawValue === 'number') {
      return rawValue !== 0;
    }

    this.logWarning(
      `Setting '${key}' has invalid type: expected boolean, got ${typeof rawValue}. Using default.`
    );
    return defaultValue;
  }

  /**
   * Get string setting. Empty strings fall back to the default.
   */
  getString(key: string, defaultValue: string): string {
    const value = this.source.get(key);

    if (value === null || value === undefined) {
      return defaultValue;
    }

    if (typeof value !== 'string') {
      this.logWarning(`Setting '${key}' has unexpected type: expected string, got ${typeof value}. Using default.`);
      return defaultValue;
    }

    return value.length > 0 ? value : defaultValue;
  }

  /**
   * Get object setting, accepted only when the guard agrees.
   */
  getObject<T>(key: string, defaultValue: T, validator: (obj: unknown) => obj is T): T {
    const value = this.source.get(key);

    if (!value || typeof value !== 'object') {
      return defaultValue;
    }

    if (!validator(value)) {
      this.logWarning(`Setting '${key}' failed validation. Using default.`);
      return defaultValue;
    }

    return value;
  }

  /**
   * Validate number is within specified range.
   */
  private validateNumberRange(
    value: number,
    defaultValue: number,
    options: { min?: number; max?: number } | undefined,
    key: string
  ): number {
    if (!Number.isFinite(value)) {
      return defaultValue;
    }

    if (options) {
      if (options.min !== undefined && value < options.min) {
        this.logWarning(
          `Setting '${key}' value ${value} below minimum (${options.min}); using default ${defaultValue}.`
        );
        return defaultValue;
      }
      if (options.max !== undefined && value > options.max) {
        this.logWarning(
          `Setting '${key}' value ${value} above maximum (${options.max}); using default ${defaultValue}.`
        );
        return defaultValue;
      }
    }

    return value;
  }

  private logDebug(message: string): void {
    this.logger?.debug(message);
  }

  private logWarning(message: string): void {
    this.logger?.warn(message);
  }
}

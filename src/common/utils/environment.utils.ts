/**
 * Environment Utilities
 * Typed reads of environment variables. An unset or empty variable yields the
 * default; an unusable one is reported with console.warn and yields the default.
 */

export interface NumericBounds {
  min?: number;
  max?: number;
}

export class EnvironmentUtils {
  static parseInt(key: string, defaultValue: number, bounds: NumericBounds = {}): number {
    return EnvironmentUtils.parseNumber(key, defaultValue, bounds, "integer", raw => parseInt(raw, 10));
  }

  static parseFloat(key: string, defaultValue: number, bounds: NumericBounds = {}): number {
    return EnvironmentUtils.parseNumber(key, defaultValue, bounds, "number", raw => parseFloat(raw));
  }

  /**
   * Accepts true/false, 1/0 and yes/no in any case
   */
  static parseBoolean(key: string, defaultValue: boolean): boolean {
    const raw = EnvironmentUtils.read(key);
    if (raw === undefined) return defaultValue;

    switch (raw.toLowerCase()) {
      case "true":
      case "1":
      case "yes":
        return true;
      case "false":
      case "0":
      case "no":
        return false;
      default:
        return EnvironmentUtils.fallback(`Invalid boolean value "${raw}" for ${key},`, defaultValue);
    }
  }

  static parseString(key: string, defaultValue: string): string {
    return EnvironmentUtils.read(key) ?? defaultValue;
  }

  /**
   * Comma-separated entries, trimmed, empty ones dropped
   */
  static parseList(key: string, defaultValue: string[] = []): string[] {
    const raw = EnvironmentUtils.read(key);
    if (raw === undefined) return defaultValue;

    return raw
      .split(",")
      .map(item => item.trim())
      .filter(Boolean);
  }

  static parseEnum<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
    const raw = EnvironmentUtils.read(key);
    if (raw === undefined) return defaultValue;

    const match = allowed.find(candidate => candidate === raw.trim());
    return (
      match ??
      EnvironmentUtils.fallback(`Invalid value "${raw}" for ${key}, expected one of ${allowed.join(", ")};`, defaultValue)
    );
  }

  private static read(key: string): string | undefined {
    const raw = process.env[key];
    return raw ? raw : undefined;
  }

  private static parseNumber(
    key: string,
    defaultValue: number,
    { min, max }: NumericBounds,
    kind: string,
    parse: (raw: string) => number
  ): number {
    const raw = EnvironmentUtils.read(key);
    if (raw === undefined) return defaultValue;

    const parsed = parse(raw);
    if (isNaN(parsed)) {
      return EnvironmentUtils.fallback(`Invalid ${kind} value "${raw}" for ${key},`, defaultValue);
    }
    if (min !== undefined && parsed < min) {
      return EnvironmentUtils.fallback(`Value ${parsed} for ${key} is below minimum ${min},`, defaultValue);
    }
    if (max !== undefined && parsed > max) {
      return EnvironmentUtils.fallback(`Value ${parsed} for ${key} is above maximum ${max},`, defaultValue);
    }
    return parsed;
  }

  private static fallback<T>(problem: string, defaultValue: T): T {
    console.warn(`${problem} using default ${String(defaultValue)}`);
    return defaultValue;
  }
}

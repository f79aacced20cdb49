/**
 * Configuration parsing and transformation utilities
 */

import { z } from 'zod';

/**
 * Size units and their byte multipliers
 */
const SIZE_UNITS = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
} as const;

export type SizeUnit = keyof typeof SIZE_UNITS;

/**
 * Time units and their millisecond multipliers
 */
const TIME_UNITS = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
} as const;

export type TimeUnit = keyof typeof TIME_UNITS;

export const SIZE = {
  BYTE: SIZE_UNITS.B,
  KB: SIZE_UNITS.KB,
  MB: SIZE_UNITS.MB,
  GB: SIZE_UNITS.GB,
} as const;

export const TIME = {
  MILLISECOND: TIME_UNITS.ms,
  SECOND: TIME_UNITS.s,
  MINUTE: TIME_UNITS.m,
  HOUR: TIME_UNITS.h,
} as const;

export const isSizeUnit = (value: string): value is SizeUnit => Object.keys(SIZE_UNITS).includes(value);

export const isTimeUnit = (value: string): value is TimeUnit => Object.keys(TIME_UNITS).includes(value);

/**
 * Configuration parsing and transformation utilities
 */
export class ConfigUtils {
  /**
   * Parse size string to bytes
   * @param size Size string like "1MB", "512KB", "1.5GB"
   */
  static parseSize(size: string | number): number {
    if (typeof size === 'number') {
      return size;
    }

    const match = size.trim().toUpperCase().match(/^(\d+(?:\.\d+)?)\s*([A-Z]+)?$/);
    if (!match) {
      throw new Error(`Invalid size format: ${size}. Expected format like "1MB", "512KB"`);
    }

    const [, valueStr = '', unit = 'B'] = match;
    if (!isSizeUnit(unit)) {
      throw new Error(`Invalid size unit: ${unit}. Valid units: ${Object.keys(SIZE_UNITS).join(', ')}`);
    }

    return Math.floor(parseFloat(valueStr) * SIZE_UNITS[unit]);
  }

  /**
   * Parse duration string to milliseconds
   * @param duration Duration string like "250ms", "30s", "1h30m15s"; bare numbers are milliseconds
   */
  static parseDuration(duration: string | number): number {
    if (typeof duration === 'number') {
      return duration;
    }

    const durationStr = duration.trim().toLowerCase();

    if (/^\d+$/.test(durationStr)) {
      return parseInt(durationStr, 10);
    }

    if (!/^(\d+(?:\.\d+)?\s*[a-z]+\s*)+$/.test(durationStr)) {
      throw new Error(`Invalid duration format: ${duration}. Expected format like "5m", "1h30m", "30s"`);
    }

    let totalMs = 0;
    for (const [, valueStr = '', unit = ''] of durationStr.matchAll(/(\d+(?:\.\d+)?)\s*([a-z]+)/g)) {
      if (!isTimeUnit(unit)) {
        throw new Error(`Invalid duration unit: ${unit}. Valid units: ${Object.keys(TIME_UNITS).join(', ')}`);
      }
      totalMs += parseFloat(valueStr) * TIME_UNITS[unit];
    }

    return Math.floor(totalMs);
  }

  /**
   * Format milliseconds as a compact duration, e.g. "1m 30s"
   */
  static formatDuration(ms: number): string {
    if (ms === 0) return '0ms';

    const units = [
      { unit: 'h', value: TIME_UNITS.h },
      { unit: 'm', value: TIME_UNITS.m },
      { unit: 's', value: TIME_UNITS.s },
      { unit: 'ms', value: TIME_UNITS.ms },
    ];

    const parts: string[] = [];
    let remaining = ms;

    for (const { unit, value } of units) {
      if (remaining >= value) {
        const count = Math.floor(remaining / value);
        parts.push(`${count}${unit}`);
        remaining %= value;
      }
    }

    return parts.join(' ') || '0ms';
  }

  /**
   * Substitute environment variables in every string of a parsed document
   */
  static processEnvVars(value: unknown): unknown {
    if (typeof value === 'string') {
      return ConfigUtils.substituteEnvVars(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => ConfigUtils.processEnvVars(item));
    }

    if (isPlainObject(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = ConfigUtils.processEnvVars(item);
      }
      return result;
    }

    return value;
  }

  /**
   * Substitute `${VAR}` and `${VAR:-default}` placeholders
   * @throws Error when a variable without default is unset
   */
  static substituteEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
    return str.replace(/\$\{([^}]+)\}/g, (_match, varExpr: string) => {
      const [varName = '', defaultValue] = varExpr.split(':-');
      const envValue = env[varName.trim()];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue.trim();
      }

      throw new Error(`Required environment variable not set: ${varName}`);
    });
  }

  /**
   * Deep-merge plain objects; arrays and primitives from later sources replace
   */
  static mergeConfigs(target: Record<string, unknown>, ...sources: Record<string, unknown>[]): Record<string, unknown> {
    const result: Record<string, unknown> = { ...target };

    for (const source of sources) {
      for (const [key, value] of Object.entries(source)) {
        if (value === undefined) {
          continue;
        }

        const existing = result[key];
        result[key] = isPlainObject(value) && isPlainObject(existing) ? ConfigUtils.mergeConfigs(existing, value) : value;
      }
    }

    return result;
  }

  /**
   * Zod field accepting "30s"-style strings or milliseconds
   */
  static durationTransformer() {
    return z.union([z.string(), z.number().nonnegative()]).transform((value, ctx) => {
      try {
        return ConfigUtils.parseDuration(value);
      } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
        return z.NEVER;
      }
    });
  }

  /**
   * Zod field accepting "1MB"-style strings or bytes
   */
  static sizeTransformer() {
    return z.union([z.string(), z.number().int().nonnegative()]).transform((value, ctx) => {
      try {
        return ConfigUtils.parseSize(value);
      } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
        return z.NEVER;
      }
    });
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export type DurationString = `${number}${TimeUnit}`;
export type SizeString = `${number}${SizeUnit}`;

import { promises as fs } from 'fs';

import { ConfigurationError } from '@switchyard/errors';
import type { Logger } from '@switchyard/logging';
import { load as yamlLoad } from 'js-yaml';
import { z } from 'zod';

import { ConfigUtils, isPlainObject } from './utils.js';

/**
 * Options for configuration management
 */
export interface ConfigOptions {
  /** Logger instance for configuration operations */
  logger?: Logger;
  /** Whether to substitute `${VAR}` / `${VAR:-default}` placeholders */
  enableEnvSubstitution?: boolean;
  /** Default configuration to merge under the loaded document */
  defaults?: Record<string, unknown>;
}

/**
 * Configuration validation error with detailed information
 */
export class ConfigValidationError extends ConfigurationError {
  constructor(
    message: string,
    public readonly errors: z.ZodError
  ) {
    super(message, {
      code: 'CONFIG_VALIDATION_FAILED',
      cause: errors,
      data: { issues: errors.issues.length },
    });
  }

  /**
   * Get formatted error details
   */
  getFormattedErrors(): string[] {
    return this.errors.issues.map(issue => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
  }
}

/**
 * Loads a YAML document and validates it against a zod schema
 */
export class ConfigManager<T> {
  private readonly logger: Logger | undefined;
  private readonly enableEnvSubstitution: boolean;
  private readonly defaults: Record<string, unknown> | undefined;

  constructor(
    private readonly configPath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: ConfigOptions = {}
  ) {
    this.logger = options.logger;
    this.enableEnvSubstitution = options.enableEnvSubstitution ?? false;
    this.defaults = options.defaults;
  }

  /**
   * Load configuration from file
   */
  async loadConfig(): Promise<T> {
    try {
      const content = await this.readConfigFile();

      let parsed: unknown;
      try {
        parsed = yamlLoad(content);
      } catch (cause) {
        throw new ConfigurationError(`Invalid YAML in ${this.configPath}`, { code: 'CONFIG_PARSE_FAILED', cause });
      }

      if (this.enableEnvSubstitution) {
        try {
          parsed = ConfigUtils.processEnvVars(parsed);
        } catch (cause) {
          throw new ConfigurationError(
            `Environment substitution failed for ${this.configPath}: ${cause instanceof Error ? cause.message : String(cause)}`,
            { code: 'CONFIG_ENV_MISSING', cause }
          );
        }
      }

      if (this.defaults) {
        parsed = ConfigUtils.mergeConfigs(this.defaults, isPlainObject(parsed) ? parsed : {});
      }

      const config = this.validateConfig(parsed);
      this.logger?.info(`Configuration loaded from: ${this.configPath}`);

      return config;
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        this.logger?.error(`Configuration validation failed: ${error.message}`, undefined, {
          errors: error.getFormattedErrors(),
        });
      } else {
        this.logger?.error('Failed to load configuration', error);
      }
      throw error;
    }
  }

  /**
   * Validate an already parsed object
   * @throws ConfigValidationError listing every issue
   */
  validateConfig(config: unknown): T {
    const result = this.schema.safeParse(config);

    if (!result.success) {
      throw new ConfigValidationError(`Configuration validation failed for ${this.configPath}`, result.error);
    }

    return result.data;
  }

  private async readConfigFile(): Promise<string> {
    try {
      return await fs.readFile(this.configPath, 'utf8');
    } catch (cause) {
      throw new ConfigurationError(`Configuration file not found: ${this.configPath}`, {
        code: 'CONFIG_NOT_FOUND',
        cause,
      });
    }
  }
}

export { z } from 'zod';
export { ConfigUtils, SIZE, TIME, isPlainObject, isSizeUnit, isTimeUnit } from './utils.js';
export type { DurationString, SizeString, SizeUnit, TimeUnit } from './utils.js';
export * from './schemas.js';

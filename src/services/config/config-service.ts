/**
 * Configuration Service
 *
 * Loads and provides access to project configuration from .impact/config.yaml:
 * manifest location, contracts directory, log level, diffusion parameters
 * and the expected-impact tolerance.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { InputError, errorMessage } from '../../core/errors.js';
import { LogLevel, parseLogLevel } from '../../core/logger.js';
import { ImpactConfigSchema, formatIssues, type ImpactConfig } from '../../core/schemas.js';
import type { PropagationOptions } from '../impact/impact-propagator.js';

export const DEFAULT_CONFIG_DIR = '.impact';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Configuration Service
 *
 * Provides access to configuration values with defaults when
 * configuration is not present. Relative paths resolve against the
 * project root.
 */
export class ConfigService {
  private projectRoot: string;
  private configPath: string;
  private cachedConfig: ImpactConfig | null = null;

  constructor(options: { projectRoot?: string; baseDir?: string } = {}) {
    this.projectRoot = options.projectRoot ?? process.cwd();
    this.configPath = path.join(
      path.resolve(this.projectRoot, options.baseDir ?? DEFAULT_CONFIG_DIR),
      'config.yaml'
    );
  }

  /**
   * Load configuration from file, with caching
   *
   * @throws InputError if the file exists but is unreadable or invalid
   */
  async getConfig(): Promise<ImpactConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let document: unknown = {};
    try {
      const content = await fs.readFile(this.configPath, 'utf-8');
      document = yaml.parse(content) ?? {};
    } catch (error) {
      if (!isMissingFile(error)) {
        throw new InputError(
          `Cannot load configuration ${this.configPath}: ${errorMessage(error)}`,
          'config',
          { path: this.configPath }
        );
      }
    }

    const parsed = ImpactConfigSchema.safeParse(document);
    if (!parsed.success) {
      throw new InputError(
        `Invalid configuration ${this.configPath}: ${formatIssues(parsed.error).join('; ')}`,
        'config',
        { path: this.configPath }
      );
    }

    this.cachedConfig = parsed.data;
    return parsed.data;
  }

  /**
   * Clear the cached configuration (useful for testing or after config changes)
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  async getManifestPath(): Promise<string> {
    const config = await this.getConfig();
    return path.resolve(this.projectRoot, config.manifest);
  }

  async getContractsDir(): Promise<string> {
    const config = await this.getConfig();
    return path.resolve(this.projectRoot, config.contractsDir);
  }

  async getLogLevel(): Promise<LogLevel> {
    const config = await this.getConfig();
    return parseLogLevel(config.logLevel);
  }

  async getPropagationOptions(): Promise<PropagationOptions> {
    const config = await this.getConfig();
    return { ...config.propagation };
  }

  async getTolerance(): Promise<number> {
    const config = await this.getConfig();
    return config.tolerance;
  }
}

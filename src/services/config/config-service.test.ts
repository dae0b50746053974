/**
 * Tests for Configuration Service
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigService } from './config-service.js';
import { InputError } from '../../core/errors.js';
import { LogLevel } from '../../core/logger.js';

const TEST_DIR = `.impact-test-config-${process.pid}`;
const CONFIG_PATH = path.join(TEST_DIR, '.impact', 'config.yaml');

async function writeConfig(content: string): Promise<void> {
  await fs.mkdir(path.dirname(CONFIG_PATH), { recursive: true });
  await fs.writeFile(CONFIG_PATH, content);
}

describe('ConfigService', () => {
  let configService: ConfigService;

  beforeEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
    await fs.mkdir(TEST_DIR, { recursive: true });
    configService = new ConfigService({ projectRoot: TEST_DIR });
  });

  afterEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('defaults', () => {
    it('should use defaults when no config file exists', async () => {
      expect(await configService.getConfig()).toEqual({
        manifest: 'components.yaml',
        contractsDir: 'contracts',
        logLevel: 'info',
        propagation: { dampingFactor: 0.85, maxIterations: 100, tolerance: 1e-4 },
        tolerance: 0.2
      });
    });

    it('should resolve paths against the project root', async () => {
      expect(await configService.getManifestPath()).toBe(path.resolve(TEST_DIR, 'components.yaml'));
      expect(await configService.getContractsDir()).toBe(path.resolve(TEST_DIR, 'contracts'));
    });

    it('should treat an empty file as defaults', async () => {
      await writeConfig('');

      expect(await configService.getTolerance()).toBe(0.2);
      expect(await configService.getLogLevel()).toBe(LogLevel.INFO);
    });
  });

  describe('configured values', () => {
    it('should read every configured value', async () => {
      await writeConfig([
        'manifest: arch/components.yml',
        'contractsDir: arch/contracts',
        'logLevel: debug',
        'propagation:',
        '  dampingFactor: 0.5',
        '  maxIterations: 20',
        'tolerance: 0.1',
        ''
      ].join('\n'));

      expect(await configService.getManifestPath()).toBe(path.resolve(TEST_DIR, 'arch/components.yml'));
      expect(await configService.getContractsDir()).toBe(path.resolve(TEST_DIR, 'arch/contracts'));
      expect(await configService.getLogLevel()).toBe(LogLevel.DEBUG);
      expect(await configService.getPropagationOptions()).toEqual({
        dampingFactor: 0.5,
        maxIterations: 20,
        tolerance: 1e-4
      });
      expect(await configService.getTolerance()).toBe(0.1);
    });

    it('should honour a custom base directory', async () => {
      await fs.mkdir(path.join(TEST_DIR, 'settings'), { recursive: true });
      await fs.writeFile(path.join(TEST_DIR, 'settings', 'config.yaml'), 'logLevel: silent\n');
      const custom = new ConfigService({ projectRoot: TEST_DIR, baseDir: 'settings' });

      expect(await custom.getLogLevel()).toBe(LogLevel.SILENT);
    });

    it('should cache until cleared', async () => {
      await writeConfig('tolerance: 0.1\n');
      expect(await configService.getTolerance()).toBe(0.1);

      await writeConfig('tolerance: 0.3\n');
      expect(await configService.getTolerance()).toBe(0.1);

      configService.clearCache();
      expect(await configService.getTolerance()).toBe(0.3);
    });

    it('should round-trip any valid tolerance', async () => {
      await fc.assert(
        fc.asyncProperty(fc.double({ min: 0, max: 1, noNaN: true }), async tolerance => {
          await writeConfig(yaml.stringify({ tolerance }));
          configService.clearCache();
          return (await configService.getTolerance()) === tolerance;
        }),
        { numRuns: 20 }
      );
    });
  });

  describe('invalid configuration', () => {
    it('should reject malformed YAML', async () => {
      await writeConfig('propagation: [1\n');

      await expect(configService.getConfig()).rejects.toThrow(InputError);
      await expect(configService.getConfig()).rejects.toThrow(`Cannot load configuration ${path.resolve(CONFIG_PATH)}`);
    });

    it('should reject out-of-range values', async () => {
      await writeConfig('propagation:\n  dampingFactor: 1.5\n');

      await expect(configService.getConfig()).rejects.toThrow(
        `Invalid configuration ${path.resolve(CONFIG_PATH)}: propagation.dampingFactor: Number must be less than 1`
      );
    });

    it('should reject unknown log levels', async () => {
      await writeConfig('logLevel: verbose\n');

      await expect(configService.getLogLevel()).rejects.toThrow(InputError);
    });
  });
});

// Wires services for a CLI invocation from options and project configuration

import * as path from 'path';
import { logger, LogLevel } from '../../core/logger.js';
import { ConfigService } from '../../services/config/config-service.js';
import { FileContractValidator } from '../../services/contracts/file-contract-validator.js';
import { ChangeImpactService } from '../../services/impact/change-impact-service.js';
import { ManifestStructureProvider } from '../../services/structure/manifest-provider.js';

/**
 * Options shared by every command that touches the project
 */
export interface ProjectOptions {
  path?: string;
  manifest?: string;
  contracts?: string;
  verbose?: boolean;
}

export interface CliContext {
  /** Absolute project root; command paths resolve against it */
  projectRoot: string;
  impactService: ChangeImpactService;
  contractValidator: FileContractValidator;
}

/**
 * Builds the services for a project root; command-line options win over config.yaml
 */
export async function createContext(options: ProjectOptions): Promise<CliContext> {
  const projectRoot = path.resolve(options.path ?? process.cwd());
  const config = new ConfigService({ projectRoot });

  logger.setLevel(await config.getLogLevel());
  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const manifestPath = options.manifest
    ? path.resolve(projectRoot, options.manifest)
    : await config.getManifestPath();
  const contractsDir = options.contracts
    ? path.resolve(projectRoot, options.contracts)
    : await config.getContractsDir();

  const contractValidator = new FileContractValidator({ contractsDir, logger });
  const impactService = new ChangeImpactService({
    structureProvider: new ManifestStructureProvider(manifestPath),
    contractValidator,
    propagation: await config.getPropagationOptions(),
    tolerance: await config.getTolerance(),
    logger
  });

  return { projectRoot, impactService, contractValidator };
}

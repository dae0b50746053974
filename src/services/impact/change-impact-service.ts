/**
 * Change Impact Service
 *
 * Predicts the blast radius of a proposed change: builds the dependency
 * graph from the code structure provider, propagates impact, classifies
 * risk, suggests mitigations and (on the validation path) checks contract
 * compliance and the declared expected impact.
 */

import { CollaboratorError, ContractComplianceError, type ContractFailure } from '../../core/errors.js';
import { logger as defaultLogger, type Logger } from '../../core/logger.js';
import { ComponentListSchema, ContractVerdictSchema, formatIssues } from '../../core/schemas.js';
import type { ChangeSpecification } from '../../models/change-spec.js';
import type { ImpactAnalysisResult, ImpactScores } from '../../models/impact.js';
import type { ContractVerdict } from '../../models/contract.js';
import type { ContractValidator } from '../contracts/contract-validator.js';
import { buildDependencyGraph } from '../graph/graph-builder.js';
import type { DependencyGraph } from '../graph/dependency-graph.js';
import { ChangeSpecLoader } from '../serialization/change-spec-loader.js';
import type { CodeStructureProvider } from '../structure/code-structure-provider.js';
import { checkExpectedImpact, DEFAULT_IMPACT_TOLERANCE } from './expected-impact.js';
import { ImpactPropagator, type PropagationOptions } from './impact-propagator.js';
import { MitigationAdvisor } from './mitigation-advisor.js';
import { RiskClassifier, groupByTier } from './risk-classifier.js';

/**
 * Contract type affected contracts are validated as
 */
export const AFFECTED_CONTRACT_TYPE = 'interface';

export interface ChangeImpactServiceOptions {
  structureProvider: CodeStructureProvider;
  contractValidator: ContractValidator;
  specLoader?: ChangeSpecLoader;
  propagation?: Partial<PropagationOptions>;
  /** Expected-impact tolerance (absolute) */
  tolerance?: number;
  logger?: Logger;
}

/**
 * Change Impact Service Interface
 */
export interface IChangeImpactService {
  analyzeChangeImpact(specPath: string): Promise<ImpactAnalysisResult>;
  validateChange(specPath: string): Promise<ImpactAnalysisResult>;
  calculateImpactScores(change: ChangeSpecification): Promise<ImpactScores>;
}

/**
 * Change Impact Service Implementation
 */
export class ChangeImpactService implements IChangeImpactService {
  private readonly structureProvider: CodeStructureProvider;
  private readonly contractValidator: ContractValidator;
  private readonly specLoader: ChangeSpecLoader;
  private readonly propagator: ImpactPropagator;
  private readonly classifier = new RiskClassifier();
  private readonly advisor = new MitigationAdvisor();
  private readonly tolerance: number;
  private readonly logger: Logger;

  constructor(options: ChangeImpactServiceOptions) {
    this.structureProvider = options.structureProvider;
    this.contractValidator = options.contractValidator;
    this.specLoader = options.specLoader ?? new ChangeSpecLoader();
    this.propagator = new ImpactPropagator(options.propagation);
    this.tolerance = options.tolerance ?? DEFAULT_IMPACT_TOLERANCE;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Loads the change specification at `specPath` and analyzes its impact
   */
  async analyzeChangeImpact(specPath: string): Promise<ImpactAnalysisResult> {
    this.logger.info(`Analyzing change impact for specification: ${specPath}`);
    const change = await this.specLoader.load(specPath);
    return this.analyzeSpecification(change);
  }

  /**
   * Loads the change specification at `specPath`, analyzes it and validates
   * it against its contracts and its expected impact
   *
   * @throws ContractComplianceError if an affected contract fails validation
   */
  async validateChange(specPath: string): Promise<ImpactAnalysisResult> {
    this.logger.info(`Validating change specification: ${specPath}`);
    const change = await this.specLoader.load(specPath);
    return this.validateSpecification(change);
  }

  /**
   * Raw impact scores for a change (graph construction and propagation only)
   */
  async calculateImpactScores(change: ChangeSpecification): Promise<ImpactScores> {
    const graph = await this.buildDependencyGraph();
    return this.propagator.propagate(graph, change);
  }

  /**
   * Analyzes an already loaded change specification
   */
  async analyzeSpecification(change: ChangeSpecification): Promise<ImpactAnalysisResult> {
    const impactScores = await this.calculateImpactScores(change);
    const riskAreas = this.classifier.classify(impactScores, change);
    const suggestedMitigations = this.advisor.advise(riskAreas);
    const affectedComponents = groupByTier(impactScores, change);

    this.logger.debug('Change impact analyzed', {
      component: change.component,
      components: impactScores.size,
      riskAreas: riskAreas.length
    });

    return { impactScores, riskAreas, suggestedMitigations, affectedComponents };
  }

  /**
   * Analyzes and validates an already loaded change specification.
   * Expected-impact mismatches are logged as warnings and do not fail the call.
   */
  async validateSpecification(change: ChangeSpecification): Promise<ImpactAnalysisResult> {
    const result = await this.analyzeSpecification(change);

    await this.validateContractCompliance(change, result);

    for (const warning of checkExpectedImpact(change.expectedImpact, result.impactScores, this.tolerance)) {
      this.logger.warn(
        `Impact mismatch for ${warning.component}: ` +
        `Expected ${warning.expected.toFixed(2)}, Actual ${warning.actual.toFixed(2)}`,
        { ...warning }
      );
    }

    return result;
  }

  /**
   * Builds the dependency graph of the provider's current snapshot
   *
   * @throws CollaboratorError if the snapshot is malformed
   */
  async buildDependencyGraph(): Promise<DependencyGraph> {
    const snapshot: unknown = await this.structureProvider.listComponents();
    const parsed = ComponentListSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new CollaboratorError(
        `Code structure provider returned an invalid snapshot: ${formatIssues(parsed.error).join('; ')}`
      );
    }
    return buildDependencyGraph(parsed.data);
  }

  /**
   * Validates every affected contract concurrently; all must pass
   */
  private async validateContractCompliance(
    change: ChangeSpecification,
    result: ImpactAnalysisResult
  ): Promise<void> {
    if (change.affectedContracts.length === 0) return;

    const verdicts = await Promise.all(
      change.affectedContracts.map(async contract => ({
        contract,
        verdict: this.checkVerdict(
          contract,
          await this.contractValidator.validate(contract, AFFECTED_CONTRACT_TYPE)
        )
      }))
    );

    const failures: ContractFailure[] = verdicts
      .filter(({ verdict }) => !verdict.isValid)
      .map(({ contract, verdict }) => ({ contract, errors: verdict.errors }));

    if (failures.length > 0) {
      throw new ContractComplianceError(failures, result);
    }
  }

  private checkVerdict(contract: string, verdict: unknown): ContractVerdict {
    const parsed = ContractVerdictSchema.safeParse(verdict);
    if (!parsed.success) {
      throw new CollaboratorError(
        `Contract validator returned an invalid verdict for ${contract}: ${formatIssues(parsed.error).join('; ')}`,
        { contract }
      );
    }
    return parsed.data;
  }
}

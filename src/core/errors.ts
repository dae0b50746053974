// Domain-specific error types for the change impact toolkit

/**
 * Base error class for all toolkit errors
 */
export abstract class ImpactToolkitError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Change specification, configuration or other caller input is missing or malformed
 */
export class InputError extends ImpactToolkitError {
  readonly code = 'INPUT_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * A collaborator (structure provider, contract validator) failed or answered with garbage
 */
export class CollaboratorError extends ImpactToolkitError {
  readonly code: string = 'COLLABORATOR_ERROR';
  readonly exitCode = 3;
}

/**
 * Not found errors
 */
export class NotFoundError extends CollaboratorError {
  override readonly code: string = 'NOT_FOUND';

  constructor(resourceType: string, id: string) {
    super(`${resourceType} not found: ${id}`, { resourceType, id });
  }
}

/**
 * A single contract that failed validation
 */
export interface ContractFailure {
  contract: string;
  errors: string[];
}

/**
 * One or more affected contracts failed validation.
 *
 * The analysis result computed before the check is kept on `result`.
 */
export class ContractComplianceError<TResult = unknown> extends ImpactToolkitError {
  readonly code = 'CONTRACT_COMPLIANCE_ERROR';
  readonly exitCode = 4;

  constructor(public readonly failures: ContractFailure[], public readonly result?: TResult) {
    super(
      failures
        .map(f => `Contract validation failed for ${f.contract}: ${f.errors.join(', ')}`)
        .join('; '),
      { contracts: failures.map(f => f.contract) }
    );
  }
}

/**
 * Security errors for path traversal
 */
export class SecurityError extends ImpactToolkitError {
  readonly code = 'SECURITY_ERROR';
  readonly exitCode = 5;
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

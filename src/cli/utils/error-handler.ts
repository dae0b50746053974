// CLI error handling utilities

import {
  ImpactToolkitError,
  InputError,
  SecurityError,
  NotFoundError,
  ContractComplianceError
} from '../../core/errors.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof InputError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    return `Input Error${field}: ${error.message}`;
  }

  if (error instanceof ContractComplianceError) {
    return `Contract Compliance Error:\n${error.failures
      .map(f => `  - ${f.contract}: ${f.errors.join(', ')}`)
      .join('\n')}`;
  }

  if (error instanceof SecurityError) {
    return `Security Error: ${error.message}`;
  }

  if (error instanceof NotFoundError) {
    return `Not Found: ${error.message}`;
  }

  if (error instanceof ImpactToolkitError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error: the toolkit error's own code, 1 for anything else
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof ImpactToolkitError ? error.exitCode : 1;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  console.error(`\n❌ ${formatError(error)}\n`);
  process.exit(exitCodeFor(error));
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.error(`✓ ${message}`);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.warn(`⚠ ${message}`);
}

// Contract validation verdict

/**
 * Outcome of validating one contract (or a merged set of contracts)
 */
export interface ContractVerdict {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

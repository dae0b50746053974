// Renders analysis results for display and storage

import * as yaml from 'yaml';
import type { ImpactAnalysisResult, ImpactScores } from '../../models/impact.js';
import type { OutputFormat } from '../../core/validation.js';

/**
 * Serializes an impact analysis result.
 * Sections and scores keep their insertion order, so equal results render identically.
 */
export function serializeResult(result: ImpactAnalysisResult, format: OutputFormat = 'yaml'): string {
  const document = {
    impactScores: result.impactScores,
    riskAreas: result.riskAreas,
    suggestedMitigations: result.suggestedMitigations,
    affectedComponents: result.affectedComponents
  };

  return render(document, format);
}

/**
 * Serializes a bare score map
 */
export function serializeScores(scores: ImpactScores, format: OutputFormat = 'yaml'): string {
  return render({ impactScores: scores }, format);
}

/**
 * Score maps as plain objects. `Object.fromEntries` defines every name as an own
 * property, `__proto__` included.
 */
function scoresToJSON(_key: string, value: unknown): unknown {
  return value instanceof Map ? Object.fromEntries(value) : value;
}

function render(document: Record<string, unknown>, format: OutputFormat): string {
  if (format === 'json') {
    // JSON objects list integer-like names first; YAML mappings keep graph order
    return `${JSON.stringify(document, scoresToJSON, 2)}\n`;
  }
  return yaml.stringify(document);
}

/**
 * Plain-text reports for the CLI.
 */

import { formatOutputRef } from './output-ref.js';
import type { PipelineSpec, ReferenceCheckResult } from './types.js';

export function formatSpecSummary(spec: PipelineSpec): string {
  const lines = [
    '',
    '=== Pipeline Specification ===',
    '',
    `  Name:        ${spec.name || '(unnamed)'}`,
  ];
  if (spec.description) {
    lines.push(`  Description: ${spec.description}`);
  }
  if (spec.version !== undefined) {
    lines.push(`  Version:     ${spec.version}`);
  }
  lines.push(`  Steps:       ${spec.steps.length}`);

  if (spec.steps.length > 0) {
    lines.push('');
    for (const step of spec.steps) {
      const inputs = step.inputs.length > 0
        ? ` <- ${step.inputs.map(formatOutputRef).join(', ')}`
        : '';
      lines.push(`  [${step.type}] ${step.id}${inputs}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

export function formatReferenceReport(spec: PipelineSpec, result: ReferenceCheckResult): string {
  const lines = ['', '=== Step Inputs ===', ''];

  for (const step of spec.steps) {
    if (step.inputs.length === 0) {
      lines.push(`  ${step.id}  (no inputs)`);
      continue;
    }
    step.inputs.forEach((ref, i) => {
      lines.push(`  ${step.id}  ${step.inputNames[i]} <- ${formatOutputRef(ref)}`);
    });
  }

  lines.push('');
  if (result.valid) {
    lines.push('  All references resolve.');
  } else {
    lines.push(`  ${result.errors.length} unresolved reference(s):`);
    for (const error of result.errors) {
      lines.push(`    - ${error}`);
    }
  }
  lines.push('');
  return lines.join('\n');
}

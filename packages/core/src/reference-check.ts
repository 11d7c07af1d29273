/**
 * Reference Check — cross-step wiring, run after loading.
 *
 * The loader only guarantees that each input is a well-formed
 * `step_id.output_name`. This pass verifies that every referenced step id
 * names a step of the same pipeline. Output names are not checked: step
 * types declare no outputs.
 */

import { formatOutputRef } from './output-ref.js';
import type { PipelineSpec, ReferenceCheckResult, StepSpec, StepType } from './types.js';

export function checkReferences(spec: PipelineSpec): ReferenceCheckResult {
  const errors: string[] = [];
  const ids = new Set(getAllStepIds(spec));

  for (const step of spec.steps) {
    step.inputs.forEach((ref, i) => {
      if (!ids.has(ref.stepId)) {
        const name = step.inputNames[i] ?? String(i);
        errors.push(
          `Step '${step.id}', input '${name}': references unknown step '${ref.stepId}' (${formatOutputRef(ref)}).`
        );
      }
    });
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Step ids in document order.
 */
export function getAllStepIds(spec: PipelineSpec): string[] {
  return spec.steps.map(step => step.id);
}

/**
 * Distinct step ids a step reads from, in first-seen order.
 */
export function getUpstreamStepIds(step: StepSpec): string[] {
  return [...new Set(step.inputs.map(ref => ref.stepId))];
}

export function countSteps(spec: PipelineSpec): number {
  return spec.steps.length;
}

export function getStepsByType(spec: PipelineSpec, type: StepType): StepSpec[] {
  return spec.steps.filter(step => step.type === type);
}

/**
 * Output-Reference Parser — `step_id.output_name` into an OutputRef.
 *
 * The split point is the LAST dot, so step ids may be dotted
 * (`ns.sub.out` → step `ns.sub`, output `out`) while output names may not.
 */

import { SpecError } from './errors.js';
import { describeNode } from './guards.js';
import type { OutputRef } from './types.js';

export function parseOutputRef(text: unknown): OutputRef {
  if (typeof text !== 'string') {
    throw new SpecError(`Output reference must be a string, got ${describeNode(text)}.`);
  }

  const dot = text.lastIndexOf('.');
  if (dot === -1) {
    throw new SpecError(`Invalid output reference '${text}'. Expected 'step_id.output_name'.`);
  }

  const stepId = text.slice(0, dot).trim();
  const output = text.slice(dot + 1).trim();
  if (!stepId || !output) {
    throw new SpecError(`Invalid output reference '${text}'. step_id and output_name must be non-empty.`);
  }

  return Object.freeze({ stepId, output });
}

export function formatOutputRef(ref: OutputRef): string {
  return `${ref.stepId}.${ref.output}`;
}

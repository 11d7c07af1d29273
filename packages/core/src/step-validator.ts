/**
 * Step Validator — one raw step node into a StepSpec.
 *
 * Checks run in a fixed order and the first failure is terminal:
 *   1. node is a mapping
 *   2. `id` is a non-empty string not already seen
 *   3. `type` is one of STEP_TYPES
 *   4. `inputs`, if present, maps names to output references
 *   5. `config`, if present, is a mapping
 *
 * The id is recorded in `seenIds` as soon as it passes (2), before the rest
 * of the step is checked.
 */

import { SpecError } from './errors.js';
import { expectMapping, describeNode, toPlainValue } from './guards.js';
import { parseOutputRef } from './output-ref.js';
import { STEP_TYPES, isStepType } from './types.js';
import type { OutputRef, StepSpec, StepType } from './types.js';

export function validateStep(node: unknown, seenIds: Set<string>, index: number): StepSpec {
  const step = expectMapping(node, `Step ${index}: each step must be a mapping/object.`);

  const id = validateStepId(step.get('id'), seenIds, index);
  seenIds.add(id);

  const type = validateStepType(step.get('type'), id);
  const { inputs, inputNames } = validateInputs(step.get('inputs'), id);
  const parameters = validateConfig(step.get('config'), id);

  return Object.freeze({
    id,
    type,
    inputs: Object.freeze(inputs),
    inputNames: Object.freeze(inputNames),
    parameters: Object.freeze(parameters),
  });
}

export function validateStepId(raw: unknown, seenIds: ReadonlySet<string>, index: number): string {
  if (typeof raw !== 'string' || !raw.trim()) {
    throw new SpecError(`Step ${index}: step 'id' is required and must be a non-empty string.`);
  }
  if (seenIds.has(raw)) {
    throw new SpecError(`Duplicate step ID '${raw}'.`);
  }
  return raw;
}

export function validateStepType(raw: unknown, stepId: string): StepType {
  const tag = typeof raw === 'string' ? raw.trim() : undefined;
  if (tag === undefined || !isStepType(tag)) {
    const shown = typeof raw === 'string' ? `'${raw}'` : raw === undefined ? '(missing)' : describeNode(raw);
    throw new SpecError(
      `Step ${stepId}: type ${shown} is invalid. Must be one of: ${STEP_TYPES.join(', ')}.`
    );
  }
  return tag;
}

function validateInputs(raw: unknown, stepId: string): { inputs: OutputRef[]; inputNames: string[] } {
  const inputs: OutputRef[] = [];
  const inputNames: string[] = [];
  if (raw === undefined || raw === null) {
    return { inputs, inputNames };
  }

  const mapping = expectMapping(raw, `Step ${stepId}: inputs must be a mapping/object if provided.`);
  for (const [name, ref] of mapping) {
    try {
      inputs.push(parseOutputRef(ref));
    } catch (err) {
      if (!(err instanceof SpecError)) throw err;
      throw new SpecError(`Step ${stepId}, input '${name}': ${err.message}`, { cause: err });
    }
    inputNames.push(name);
  }
  return { inputs, inputNames };
}

function validateConfig(raw: unknown, stepId: string): Record<string, unknown> {
  if (raw === undefined || raw === null) {
    return {};
  }
  const config = expectMapping(raw, `Step ${stepId}: config must be a mapping/object if provided.`);
  return Object.fromEntries([...config].map(([key, value]) => [key, toPlainValue(value)]));
}

/**
 * Spec Assembler — YAML document into a validated, frozen PipelineSpec.
 *
 * Walks the document top-down: root mapping, header fields, then every step
 * in document order through the Step Validator. The first failure
 * propagates; there is no partial result.
 *
 * Only syntax and local well-formedness are enforced. Whether a referenced
 * step actually exists is left to checkReferences(), which runs here only
 * when LoadOptions.checkReferences is set.
 */

import { createEvent } from '../../shared/index.js';
import type { SpecLoadedPayload, SpecRejectedPayload } from '../../shared/index.js';
import { SpecError } from './errors.js';
import { expectMapping, expectSequence, toPlainValue } from './guards.js';
import { validateStep } from './step-validator.js';
import { checkReferences } from './reference-check.js';
import { parseDocument, readDocumentFile } from './document.js';
import type { LoadOptions, PipelineSpec, StepSpec } from './types.js';

const INLINE_SOURCE = '<inline>';

/**
 * Load a pipeline specification from YAML text.
 */
export function loadPipelineSpec(source: string, options: LoadOptions = {}): PipelineSpec {
  try {
    const root = parseDocument(source, options.filename);
    const spec = assemblePipelineSpec(root);
    if (options.checkReferences) {
      assertReferences(spec);
    }
    publishLoaded(spec, options);
    return spec;
  } catch (err) {
    if (err instanceof SpecError) {
      publishRejected(err, options);
    }
    throw err;
  }
}

/**
 * Load a pipeline specification from a UTF-8 YAML file.
 */
export function loadPipelineSpecFile(path: string, options: LoadOptions = {}): PipelineSpec {
  const fileOptions: LoadOptions = { ...options, filename: options.filename ?? path };
  let text: string;
  try {
    text = readDocumentFile(path);
  } catch (err) {
    if (err instanceof SpecError) {
      publishRejected(err, fileOptions);
    }
    throw err;
  }
  return loadPipelineSpec(text, fileOptions);
}

/**
 * Build a PipelineSpec from an already decoded document tree.
 */
export function assemblePipelineSpec(root: unknown): PipelineSpec {
  const doc = expectMapping(root, 'Top-level YAML must be a mapping (key/value object).');

  const stepsSeq = expectSequence(doc.get('steps'), "Top-level field 'steps' is required and must be a list.");

  const steps: StepSpec[] = [];
  const seenIds = new Set<string>();
  stepsSeq.forEach((node, i) => {
    steps.push(validateStep(node, seenIds, i));
  });

  const metadata = Object.fromEntries(
    [...doc].filter(([key]) => key !== 'steps').map(([key, value]) => [key, toPlainValue(value)])
  );

  const name = doc.get('name');
  const description = doc.get('description');
  const version = doc.get('version');

  return Object.freeze({
    name: typeof name === 'string' ? name : undefined,
    description: typeof description === 'string' ? description : undefined,
    version: typeof version === 'number' && Number.isInteger(version) ? version : undefined,
    steps: Object.freeze(steps),
    metadata: Object.freeze(metadata),
  });
}

function assertReferences(spec: PipelineSpec): void {
  const result = checkReferences(spec);
  if (!result.valid) {
    throw new SpecError(['Pipeline references are invalid:', ...result.errors.map(e => `  - ${e}`)].join('\n'));
  }
}

// ─── Events ──────────────────────────────────────────────────────

function publishLoaded(spec: PipelineSpec, options: LoadOptions): void {
  if (!options.bus) return;
  const payload: SpecLoadedPayload = {
    name: spec.name ?? null,
    stepCount: spec.steps.length,
    source: options.filename ?? INLINE_SOURCE,
  };
  void options.bus.emit(createEvent('spec.loaded', 'loader', payload, { correlationId: options.correlationId }));
}

function publishRejected(err: SpecError, options: LoadOptions): void {
  if (!options.bus) return;
  const payload: SpecRejectedPayload = {
    source: options.filename ?? INLINE_SOURCE,
    message: err.message,
  };
  void options.bus.emit(createEvent('spec.rejected', 'loader', payload, { correlationId: options.correlationId }));
}

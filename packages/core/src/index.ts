/**
 * PipeSpec Core — Pipeline Specification Loader
 *
 * YAML in, validated and frozen PipelineSpec out. Every downstream
 * component consumes the model, never raw document nodes.
 */

export const VERSION = '0.1.0';

// ─── Loader ──────────────────────────────────────────────────────
export { loadPipelineSpec, loadPipelineSpecFile, assemblePipelineSpec } from './spec-loader.js';
export { parseDocument, readDocumentFile } from './document.js';

// ─── Validation Building Blocks ──────────────────────────────────
export { validateStep, validateStepId, validateStepType } from './step-validator.js';
export { parseOutputRef, formatOutputRef } from './output-ref.js';
export { expectMapping, expectSequence, nodeKind, describeNode, toPlainValue } from './guards.js';
export type { DocMapping, DocSequence, NodeKind } from './guards.js';
export { SpecError } from './errors.js';

// ─── Reference Check ─────────────────────────────────────────────
export {
  checkReferences,
  getAllStepIds,
  getUpstreamStepIds,
  countSteps,
  getStepsByType,
} from './reference-check.js';

// ─── Reports ─────────────────────────────────────────────────────
export { formatSpecSummary, formatReferenceReport } from './report.js';

// ─── Types ───────────────────────────────────────────────────────
export { STEP_TYPES, isStepType } from './types.js';
export type {
  StepType,
  OutputRef,
  StepSpec,
  PipelineSpec,
  LoadOptions,
  ReferenceCheckResult,
} from './types.js';

/**
 * PipeSpec Types — Validated Pipeline Model
 *
 * The contract between the loader and every consumer (scheduler, executor).
 * Consumers never see raw document nodes, only these shapes.
 */

import type { EventBus } from '../../shared/index.js';

// ─── Step Type (closed set) ──────────────────────────────────────

export const STEP_TYPES = ['ingest', 'transform', 'check', 'export'] as const;

export type StepType = (typeof STEP_TYPES)[number];

export function isStepType(value: string): value is StepType {
  return STEP_TYPES.some(t => t === value);
}

// ─── Pipeline Specification ──────────────────────────────────────

/**
 * Reference to a named output of a step, written `step_id.output_name`.
 */
export interface OutputRef {
  readonly stepId: string;
  readonly output: string;
}

export interface StepSpec {
  readonly id: string;
  readonly type: StepType;
  /** Upstream outputs in the order the `inputs` mapping lists them. */
  readonly inputs: readonly OutputRef[];
  /** Keys of the `inputs` mapping, index-aligned with `inputs`. */
  readonly inputNames: readonly string[];
  /** The step's `config` mapping, uninterpreted. */
  readonly parameters: Readonly<Record<string, unknown>>;
}

export interface PipelineSpec {
  readonly name: string | undefined;
  readonly description: string | undefined;
  readonly version: number | undefined;
  readonly steps: readonly StepSpec[];
  /** Every top-level entry except `steps`, as found in the document. */
  readonly metadata: Readonly<Record<string, unknown>>;
}

// ─── Loading ─────────────────────────────────────────────────────

export interface LoadOptions {
  filename?: string;                  // shown in YAML error positions and events
  bus?: EventBus;                     // publishes spec.loaded / spec.rejected
  correlationId?: string;
  checkReferences?: boolean;          // default false
}

// ─── Reference Check ─────────────────────────────────────────────

export interface ReferenceCheckResult {
  valid: boolean;
  errors: string[];
}

/**
 * pipespec validate — load a pipeline file and summarize it.
 *
 * With `strict`, unresolved step references are rejected as well.
 */

import type { EventBus } from '../../../shared/index.js';
import { SpecError } from '../errors.js';
import { loadPipelineSpecFile } from '../spec-loader.js';
import { formatSpecSummary } from '../report.js';
import type { PipelineSpec } from '../types.js';

export interface ValidateResult {
  ok: boolean;
  spec: PipelineSpec | null;
  report: string;
}

export interface ValidateOptions {
  strict?: boolean;
  bus?: EventBus;
}

export function validate(path: string, opts?: ValidateOptions): ValidateResult {
  try {
    const spec = loadPipelineSpecFile(path, {
      bus: opts?.bus,
      checkReferences: opts?.strict ?? false,
    });
    return { ok: true, spec, report: formatSpecSummary(spec) };
  } catch (err) {
    if (!(err instanceof SpecError)) throw err;
    return { ok: false, spec: null, report: formatRejection(path, err) };
  }
}

export function formatRejection(path: string, err: SpecError): string {
  return [`Invalid pipeline specification: ${path}`, '', ...err.message.split('\n').map(l => `  ${l}`)].join('\n');
}

/**
 * pipespec refs — list every step input and check that each referenced
 * step exists.
 */

import { createEvent } from '../../../shared/index.js';
import type { EventBus, ReferencesCheckedPayload } from '../../../shared/index.js';
import { SpecError } from '../errors.js';
import { loadPipelineSpecFile } from '../spec-loader.js';
import { checkReferences } from '../reference-check.js';
import { formatReferenceReport } from '../report.js';
import type { ReferenceCheckResult } from '../types.js';
import { formatRejection } from './validate.js';

export interface RefsResult {
  ok: boolean;
  result: ReferenceCheckResult | null;
  report: string;
}

export interface RefsOptions {
  bus?: EventBus;
}

export function refs(path: string, opts?: RefsOptions): RefsResult {
  try {
    const spec = loadPipelineSpecFile(path, { bus: opts?.bus });
    const result = checkReferences(spec);

    if (opts?.bus) {
      const payload: ReferencesCheckedPayload = {
        name: spec.name ?? null,
        valid: result.valid,
        errorCount: result.errors.length,
      };
      void opts.bus.emit(createEvent('spec.references_checked', 'cli', payload));
    }

    return { ok: result.valid, result, report: formatReferenceReport(spec, result) };
  } catch (err) {
    if (!(err instanceof SpecError)) throw err;
    return { ok: false, result: null, report: formatRejection(path, err) };
  }
}

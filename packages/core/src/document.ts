/**
 * Document source — raw text and YAML decoding.
 *
 * The only place that touches the file system or the YAML library. Anything
 * that goes wrong here becomes a SpecError with the original kept as `cause`.
 */

import { readFileSync } from 'fs';
import YAML from 'yaml';
import { SpecError, errorMessage } from './errors.js';

/**
 * Decode YAML text into a generic node tree. Mappings come back as `Map`s
 * in document order; duplicate keys are a decode failure.
 */
export function parseDocument(text: string, filename?: string): unknown {
  const doc = YAML.parseDocument(text);
  const [first] = doc.errors;
  if (first) {
    const where = filename ? ` (in "${filename}")` : '';
    throw new SpecError(`Failed to parse YAML${where}: ${first.message}`, { cause: first });
  }
  return doc.toJS({ mapAsMap: true });
}

export function readDocumentFile(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (err) {
    throw new SpecError(`Failed to read pipeline file '${path}': ${errorMessage(err)}`, { cause: err });
  }
}

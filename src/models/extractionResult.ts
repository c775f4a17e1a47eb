import { AtomRecord } from './atom';

export type QuantumFormat =
  | 'gaussian-input'
  | 'gaussian-log'
  | 'molpro-input'
  | 'molpro-output';

/**
 * Which section of a Gaussian log the coordinates came from
 */
export type ExtractionMethod = 'punch' | 'standard-orientation';

export interface ExtractionResult {
  readonly sourcePath: string;
  readonly format: QuantumFormat;
  readonly atoms: readonly AtomRecord[];
  readonly formula: string;
  readonly extractionMethod?: ExtractionMethod;
}

/**
 * Build a frozen result. `extractionMethod` is only kept for Gaussian logs.
 */
export function createExtractionResult(
  sourcePath: string,
  format: QuantumFormat,
  atoms: AtomRecord[],
  formula: string,
  extractionMethod?: ExtractionMethod
): ExtractionResult {
  const result: ExtractionResult =
    format === 'gaussian-log' && extractionMethod
      ? { sourcePath, format, atoms: Object.freeze([...atoms]), formula, extractionMethod }
      : { sourcePath, format, atoms: Object.freeze([...atoms]), formula };
  return Object.freeze(result);
}

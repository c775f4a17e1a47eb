import { ExtractionResult } from '../models';
import { ExtractionError } from './extractionError';
import { ExtractionOptions, extractFile } from './extractionPipeline';

export type BatchStatus = 'success' | 'partial' | 'failure';

export interface BatchReport {
  successes: ExtractionResult[];
  failures: ExtractionError[];
  status: BatchStatus;
}

/**
 * Extract every path in order. One file's failure never affects the others.
 */
export function extractBatch(paths: string[], options: ExtractionOptions = {}): BatchReport {
  const successes: ExtractionResult[] = [];
  const failures: ExtractionError[] = [];

  for (const filePath of paths) {
    const outcome = extractFile(filePath, options);
    if (outcome.ok) {
      successes.push(outcome.result);
    } else {
      failures.push(outcome.error);
    }
  }

  let status: BatchStatus = 'failure';
  if (successes.length > 0) {
    status = failures.length === 0 ? 'success' : 'partial';
  }
  return { successes, failures, status };
}

/**
 * 0 when at least one file was extracted, 1 otherwise
 */
export function exitCodeFor(report: BatchReport): number {
  return report.successes.length > 0 ? 0 : 1;
}

/**
 * qcgeom - atomic coordinates and molecular formulas from Gaussian and MOLPRO files
 */

export * from './models';
export { detectFormat, getSupportedExtensions } from './io/formatDetector';
export type { DetectedFormat } from './io/formatDetector';
export { parseCoordinateLine, parseDecimal } from './io/coordinateLine';
export { ExtractionError, isExtractionError } from './io/extractionError';
export type { ExtractionErrorKind } from './io/extractionError';
export { extractContent, extractFile } from './io/extractionPipeline';
export type { ExtractionOptions, ExtractionOutcome } from './io/extractionPipeline';
export { exitCodeFor, extractBatch } from './io/batchRunner';
export type { BatchReport, BatchStatus } from './io/batchRunner';
export * from './io/locators';
export * from './renderers';
export { generateFormula } from './utils/formula';
export { parseElement, symbolForAtomicNumber } from './utils/elementData';
export { createLogger } from './utils/logger';
export type { Logger } from './utils/logger';

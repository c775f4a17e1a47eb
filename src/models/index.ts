/**
 * Export all data models for easy importing
 */

export { AtomRecord } from './atom';
export { createExtractionResult } from './extractionResult';
export type { ExtractionResult, ExtractionMethod, QuantumFormat } from './extractionResult';

import * as path from 'path';
import { QuantumFormat } from '../models';

/**
 * File extension to format mapping
 */
const FORMAT_MAP: Record<string, QuantumFormat> = {
  com: 'gaussian-input',
  log: 'gaussian-log',
  in: 'molpro-input',
  out: 'molpro-output',
};

export type DetectedFormat = QuantumFormat | 'unsupported';

/**
 * Classify a path by its lowercase extension. Content is never inspected.
 */
export function detectFormat(filePath: string): DetectedFormat {
  const ext = getFileExtension(filePath).toLowerCase();
  return Object.prototype.hasOwnProperty.call(FORMAT_MAP, ext) ? FORMAT_MAP[ext] : 'unsupported';
}

/**
 * Get supported extensions, without the leading dot
 */
export function getSupportedExtensions(): string[] {
  return Object.keys(FORMAT_MAP);
}

/**
 * Get file extension
 */
function getFileExtension(filePath: string): string {
  return path.extname(filePath).replace(/^\./, '');
}

import * as fs from 'fs';
import { ExtractionResult, QuantumFormat, createExtractionResult } from '../models';
import { generateFormula } from '../utils/formula';
import { Logger, silentLogger } from '../utils/logger';
import { parseCoordinateBlock } from './coordinateLine';
import { ExtractionError } from './extractionError';
import { detectFormat } from './formatDetector';
import {
  BlockLocator,
  GaussianInputLocator,
  GaussianLogLocator,
  MolproInputLocator,
  MolproOutputLocator,
} from './locators';

/**
 * Format to locator mapping
 */
const LOCATOR_MAP: Record<QuantumFormat, BlockLocator> = {
  'gaussian-input': new GaussianInputLocator(),
  'gaussian-log': new GaussianLogLocator(),
  'molpro-input': new MolproInputLocator(),
  'molpro-output': new MolproOutputLocator(),
};

export interface ExtractionOptions {
  logger?: Logger;
}

export type ExtractionOutcome =
  | { ok: true; result: ExtractionResult }
  | { ok: false; error: ExtractionError };

/**
 * Extract coordinates from already-read file content
 */
export function extractContent(
  sourcePath: string,
  format: QuantumFormat,
  content: string,
  options: ExtractionOptions = {}
): ExtractionOutcome {
  const logger = options.logger ?? silentLogger;
  try {
    const block = LOCATOR_MAP[format].locate(content, logger);
    if (block.lines.length === 0) {
      throw new ExtractionError('EmptyBlock', `Coordinate block in ${format} file has no atom lines`);
    }

    const atoms = parseCoordinateBlock(block.lines, block.layout);
    const formula = generateFormula(atoms);
    logger.debug(`Parsed ${atoms.length} atom(s) from ${sourcePath}: ${formula}`);

    return {
      ok: true,
      result: createExtractionResult(sourcePath, format, atoms, formula, block.method),
    };
  } catch (error) {
    if (error instanceof ExtractionError) {
      return { ok: false, error: error.withPath(sourcePath) };
    }
    throw error;
  }
}

/**
 * Detect, read and extract one file. Per-file problems come back as failures;
 * only unexpected errors are thrown.
 */
export function extractFile(filePath: string, options: ExtractionOptions = {}): ExtractionOutcome {
  const logger = options.logger ?? silentLogger;
  const format = detectFormat(filePath);
  logger.debug(`Detected format ${format} for ${filePath}`);

  if (format === 'unsupported') {
    return {
      ok: false,
      error: new ExtractionError(
        'UnsupportedFormat',
        'Unsupported file type; expected Gaussian (.com, .log) or MOLPRO (.in, .out)',
        filePath
      ),
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new ExtractionError('IOFailure', `Failed to read file: ${reason}`, filePath) };
  }

  return extractContent(filePath, format, content, options);
}

import { AtomRecord } from '../models';
import { parseElement } from '../utils/elementData';
import { ExtractionError } from './extractionError';
import { LineLayout, WHITESPACE_LAYOUT } from './locators/blockLocator';

// Signed decimal with optional exponent; Fortran D exponents and a bare trailing dot (0.) allowed
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eEdD][+-]?\d+)?$/;

/**
 * Parse a finite decimal token, or return null
 */
export function parseDecimal(token: string): number | null {
  if (!DECIMAL.test(token)) {
    return null;
  }
  const value = Number(token.replace(/[dD]/, 'e'));
  return Number.isFinite(value) ? value : null;
}

export function tokenize(line: string, delimiter: RegExp): string[] {
  return line
    .trim()
    .replace(/;+$/, '')
    .split(delimiter)
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

/**
 * Parse one located line into an atom.
 * Throws ExtractionError('MalformedLine') on short lines, element tokens that are no symbol or number,
 * or non-numeric coordinates.
 */
export function parseCoordinateLine(line: string, layout: LineLayout = WHITESPACE_LAYOUT): AtomRecord {
  const parts = tokenize(line, layout.delimiter);
  const coordinateStart =
    layout.coordinateColumn === 'trailing' ? parts.length - 3 : layout.coordinateColumn;
  const required = Math.max(4, layout.elementColumn + 1, coordinateStart + 3);

  if (parts.length < required || coordinateStart <= layout.elementColumn) {
    throw new ExtractionError(
      'MalformedLine',
      `Invalid coordinate line: expected at least ${required} fields, found ${parts.length}`
    );
  }

  const elementToken = parts[layout.elementColumn];
  const element = parseElement(elementToken);
  if (!element) {
    throw new ExtractionError('MalformedLine', `Invalid coordinate line: unrecognised element token "${elementToken}"`);
  }

  const coordinateTokens = parts.slice(coordinateStart, coordinateStart + 3);
  const [x, y, z] = coordinateTokens.map((token) => parseDecimal(token));
  if (x === null || y === null || z === null) {
    const bad = coordinateTokens.find((token) => parseDecimal(token) === null);
    throw new ExtractionError('MalformedLine', `Invalid coordinate line: non-numeric coordinate "${bad}"`);
  }

  return new AtomRecord(element, x, y, z);
}

/**
 * Parse every line of a block. A single bad line invalidates the block.
 */
export function parseCoordinateBlock(lines: string[], layout: LineLayout): AtomRecord[] {
  return lines.map((line, index) => {
    try {
      return parseCoordinateLine(line, layout);
    } catch (error) {
      if (error instanceof ExtractionError) {
        throw new ExtractionError(
          error.kind,
          `${error.message} (block line ${index + 1}: "${line.trim()}")`
        );
      }
      throw error;
    }
  });
}

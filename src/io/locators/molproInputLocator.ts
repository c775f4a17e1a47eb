import { Logger, silentLogger } from '../../utils/logger';
import { ExtractionError } from '../extractionError';
import { BlockLocator, LineLayout, RawBlock, splitLines } from './blockLocator';

// Directives may precede the marker on its line: angstrom;geometry={ or symmetry,nosym;geom={
const BRACE_OPEN = /^(?:[^{}]*[;,]\s*)?geom(?:etry)?\s*=?\s*\{(.*)$/i;
const KEYWORD_OPEN = /^geom(?:etry)?$/i;
const KEYWORD_CLOSE = /^end(?:geom(?:etry)?)?$/i;
const DIRECTIVE = /^(?:angstrom|ang|bohr|au|noorient|nosym|symmetry\b.*|orient\b.*|mass\b.*)[;,]?$/i;

export const MOLPRO_LAYOUT: LineLayout = {
  delimiter: /[\s,]+/,
  elementColumn: 0,
  coordinateColumn: 1,
};

/**
 * Scan for geometry blocks and return the entries of the last complete one, or null.
 * Handles geometry={...} (also on one line, entries split by ';') and geometry ... end.
 */
export function findLastGeometryBlock(content: string): { entries: string[]; count: number } | null {
  let last: string[] | null = null;
  let count = 0;
  let current: string[] | null = null;
  let closer: 'brace' | 'keyword' = 'brace';

  for (const raw of splitLines(content)) {
    const line = raw.trim();

    if (current === null) {
      const brace = line.match(BRACE_OPEN);
      if (brace) {
        const rest = brace[1];
        const closeAt = rest.indexOf('}');
        current = [closeAt >= 0 ? rest.slice(0, closeAt) : rest];
        closer = 'brace';
        if (closeAt >= 0) {
          last = current;
          count++;
          current = null;
        }
      } else if (KEYWORD_OPEN.test(line)) {
        current = [];
        closer = 'keyword';
      }
      continue;
    }

    if (closer === 'brace') {
      const closeAt = line.indexOf('}');
      if (closeAt >= 0) {
        current.push(line.slice(0, closeAt));
        last = current;
        count++;
        current = null;
        continue;
      }
    } else if (KEYWORD_CLOSE.test(line)) {
      last = current;
      count++;
      current = null;
      continue;
    }
    current.push(line);
  }

  return last ? { entries: cleanGeometryEntries(last), count } : null;
}

/**
 * Drop comments, directives, blank entries and an XYZ-style count/title header
 */
export function cleanGeometryEntries(lines: string[]): string[] {
  const entries = lines
    .flatMap((line) => line.split(';'))
    .map((entry) => entry.replace(/!.*$/, '').trim());

  const first = entries.findIndex((entry) => entry.length > 0);
  if (first >= 0 && /^\d+$/.test(entries[first])) {
    // XYZ-style block: atom count, then a title line that may be empty
    entries.splice(first, 2);
  }

  return entries.filter(
    (entry) =>
      entry.length > 0 && !entry.startsWith('#') && !entry.includes('=') && !DIRECTIVE.test(entry)
  );
}

/**
 * MOLPRO input file locator (.in)
 */
export class MolproInputLocator implements BlockLocator {
  locate(content: string, logger: Logger = silentLogger): RawBlock {
    const found = findLastGeometryBlock(content);
    if (!found) {
      throw new ExtractionError('BlockNotFound', 'Invalid MOLPRO input: missing geometry block');
    }
    logger.debug(`Found ${found.count} MOLPRO geometry block(s), using last (${found.entries.length} line(s))`);
    return { lines: found.entries, layout: MOLPRO_LAYOUT };
  }
}

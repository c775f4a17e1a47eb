import { Logger, silentLogger } from '../../utils/logger';
import { ExtractionError } from '../extractionError';
import { BlockLocator, LineLayout, RawBlock, splitLines } from './blockLocator';
import { MOLPRO_LAYOUT, findLastGeometryBlock } from './molproInputLocator';

const ATOMIC_COORDINATES = /^ATOMIC\s+COORDINATES\s*$/i;
// NR  ATOM  CHARGE  X  Y  Z
const ROW = /^\d+\s+[A-Za-z]\S*\s+\S/;

export const MOLPRO_TABLE_LAYOUT: LineLayout = {
  delimiter: /\s+/,
  elementColumn: 1,
  coordinateColumn: 3,
};

/**
 * MOLPRO output locator (.out)
 * Reads the last ATOMIC COORDINATES table; outputs without one fall back to
 * the last geometry block echoed from the input.
 */
export class MolproOutputLocator implements BlockLocator {
  locate(content: string, logger: Logger = silentLogger): RawBlock {
    let last: string[] | null = null;
    let count = 0;
    let current: string[] | null = null;

    for (const raw of splitLines(content)) {
      const line = raw.trim();
      if (ATOMIC_COORDINATES.test(line)) {
        if (current && current.length > 0) {
          last = current;
        }
        current = [];
        count++;
        continue;
      }
      if (current === null) {
        continue;
      }
      // Blank lines and the column header before the first row
      if (current.length === 0 && (!line || /^NR\b/i.test(line))) {
        continue;
      }
      if (line && ROW.test(line)) {
        current.push(line);
        continue;
      }
      if (current.length > 0) {
        last = current;
      }
      current = null;
    }
    if (current && current.length > 0) {
      last = current;
    }

    if (last) {
      logger.debug(`Found ${count} ATOMIC COORDINATES table(s), using last (${last.length} row(s))`);
      return { lines: last, layout: MOLPRO_TABLE_LAYOUT };
    }

    const echoed = findLastGeometryBlock(content);
    if (echoed) {
      logger.debug('No ATOMIC COORDINATES table, using echoed geometry block');
      return { lines: echoed.entries, layout: MOLPRO_LAYOUT };
    }

    throw new ExtractionError(
      'BlockNotFound',
      'Invalid MOLPRO output: no ATOMIC COORDINATES table or geometry block'
    );
  }
}

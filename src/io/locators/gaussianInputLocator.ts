import { Logger, silentLogger } from '../../utils/logger';
import { ExtractionError } from '../extractionError';
import { BlockLocator, LineLayout, RawBlock, splitLines } from './blockLocator';

// One or more charge/multiplicity pairs (several for ONIOM layers)
const CHARGE_MULTIPLICITY = /^[+-]?\d+[\s,]+[+-]?\d+(?:[\s,]+[+-]?\d+[\s,]+[+-]?\d+)*$/;

export const GAUSSIAN_INPUT_LAYOUT: LineLayout = {
  delimiter: /[\s,]+/,
  elementColumn: 0,
  coordinateColumn: 1,
};

/**
 * Gaussian input file locator (.com)
 * Reads the molecule specification that follows the charge/multiplicity line.
 * TV lattice vectors are not atoms and are left out.
 */
export class GaussianInputLocator implements BlockLocator {
  locate(content: string, logger: Logger = silentLogger): RawBlock {
    const lines = splitLines(content);

    let chargeMultiplicityIndex = this.findAfterHeader(lines);
    if (chargeMultiplicityIndex < 0) {
      chargeMultiplicityIndex = lines.findIndex((line) => CHARGE_MULTIPLICITY.test(line.trim()));
      if (chargeMultiplicityIndex >= 0) {
        logger.debug(`Charge/multiplicity found by scan at line ${chargeMultiplicityIndex + 1}`);
      }
    }
    if (chargeMultiplicityIndex < 0) {
      throw new ExtractionError('BlockNotFound', 'Invalid Gaussian input: missing charge/multiplicity line');
    }

    const block: string[] = [];
    for (let idx = chargeMultiplicityIndex + 1; idx < lines.length; idx++) {
      const line = lines[idx].trim();
      if (!line) {
        break;
      }
      if (/^tv\b/i.test(line)) {
        continue;
      }
      block.push(line);
    }

    logger.debug(`Gaussian input: ${block.length} line(s) after charge/multiplicity`);
    return { lines: block, layout: GAUSSIAN_INPUT_LAYOUT };
  }

  /**
   * Walk Link0/route, then title, and return the index of the charge/multiplicity line
   */
  private findAfterHeader(lines: string[]): number {
    let idx = 0;
    const skipBlank = () => {
      while (idx < lines.length && lines[idx].trim() === '') {
        idx++;
      }
    };
    const skipSection = () => {
      while (idx < lines.length && lines[idx].trim() !== '') {
        idx++;
      }
    };

    skipBlank();
    // Link0 commands and route section
    skipSection();
    skipBlank();
    // Title section
    skipSection();
    skipBlank();

    if (idx < lines.length && CHARGE_MULTIPLICITY.test(lines[idx].trim())) {
      return idx;
    }
    return -1;
  }
}

import { ExtractionMethod } from '../../models';
import { Logger } from '../../utils/logger';

/**
 * How the tokens of a located line map onto element and coordinates
 */
export interface LineLayout {
  delimiter: RegExp;
  elementColumn: number;
  /** Index of X, or 'trailing' to read the last three tokens */
  coordinateColumn: number | 'trailing';
}

export const WHITESPACE_LAYOUT: LineLayout = {
  delimiter: /\s+/,
  elementColumn: 0,
  coordinateColumn: 1,
};

export interface RawBlock {
  lines: string[];
  layout: LineLayout;
  method?: ExtractionMethod;
}

/**
 * Locator interface for the different file formats.
 * Throws ExtractionError('BlockNotFound') when the file has no coordinate section.
 */
export interface BlockLocator {
  locate(content: string, logger?: Logger): RawBlock;
}

export function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}

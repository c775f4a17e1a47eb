import { ExtractionMethod } from '../../models';
import { Logger, silentLogger } from '../../utils/logger';
import { ExtractionError } from '../extractionError';
import { BlockLocator, LineLayout, RawBlock, splitLines } from './blockLocator';

export type LogState =
  | 'SEARCH_TERMINATION'
  | 'TERMINATION_FOUND'
  | 'TERMINATION_ABSENT'
  | 'SEARCH_PUNCH'
  | 'PUNCH_FOUND'
  | 'PUNCH_ABSENT'
  | 'SEARCH_STANDARD_ORIENTATION'
  | 'FOUND'
  | 'NOT_FOUND'
  | 'DONE'
  | 'FAILED';

/**
 * Lookups the state machine performs against a log
 */
export interface LogProbes {
  hasNormalTermination(): boolean;
  findPunch(): string[] | null;
  findStandardOrientation(): string[] | null;
}

export interface LogRun {
  states: LogState[];
  method?: ExtractionMethod;
  lines?: string[];
}

export const PUNCH_LAYOUT: LineLayout = {
  delimiter: /,/,
  elementColumn: 0,
  coordinateColumn: 'trailing',
};

// Center  AtomicNumber  [AtomicType]  X  Y  Z
export const STANDARD_ORIENTATION_LAYOUT: LineLayout = {
  delimiter: /\s+/,
  elementColumn: 1,
  coordinateColumn: 'trailing',
};

const NORMAL_TERMINATION = /Normal termination/;
const ARCHIVE_START = /^1\\1\\/;
const STANDARD_ORIENTATION = /standard\s+orientation:/i;
const RULE = /^-{20,}$/;
const CHARGE_MULTIPLICITY = /^[+-]?\d+,[+-]?\d+(?:,[+-]?\d+,[+-]?\d+)*$/;

/**
 * Drive the termination / punch / standard orientation decision.
 * TERMINATION_ABSENT never searches for a punch; PUNCH_ABSENT falls back to standard orientation.
 */
export function runLogStateMachine(probes: LogProbes): LogRun {
  const run: LogRun = { states: [] };
  let state: LogState = 'SEARCH_TERMINATION';

  for (;;) {
    run.states.push(state);
    switch (state) {
      case 'SEARCH_TERMINATION':
        state = probes.hasNormalTermination() ? 'TERMINATION_FOUND' : 'TERMINATION_ABSENT';
        break;
      case 'TERMINATION_FOUND':
        state = 'SEARCH_PUNCH';
        break;
      case 'TERMINATION_ABSENT':
        state = 'SEARCH_STANDARD_ORIENTATION';
        break;
      case 'SEARCH_PUNCH': {
        const punch = probes.findPunch();
        if (punch) {
          run.method = 'punch';
          run.lines = punch;
        }
        state = punch ? 'PUNCH_FOUND' : 'PUNCH_ABSENT';
        break;
      }
      case 'PUNCH_FOUND':
        state = 'DONE';
        break;
      case 'PUNCH_ABSENT':
        state = 'SEARCH_STANDARD_ORIENTATION';
        break;
      case 'SEARCH_STANDARD_ORIENTATION': {
        const table = probes.findStandardOrientation();
        if (table) {
          run.method = 'standard-orientation';
          run.lines = table;
        }
        state = table ? 'FOUND' : 'NOT_FOUND';
        break;
      }
      case 'FOUND':
        state = 'DONE';
        break;
      case 'NOT_FOUND':
        state = 'FAILED';
        break;
      case 'DONE':
      case 'FAILED':
        return run;
    }
  }
}

/**
 * Strategy for a log with a standard orientation table present
 */
export function chooseLogStrategy(terminatedNormally: boolean, punchPresent: boolean): ExtractionMethod {
  const run = runLogStateMachine({
    hasNormalTermination: () => terminatedNormally,
    findPunch: () => (punchPresent ? [] : null),
    findStandardOrientation: () => [],
  });
  return run.method ?? 'standard-orientation';
}

export function hasNormalTermination(lines: string[]): boolean {
  return lines.some((line) => NORMAL_TERMINATION.test(line));
}

/**
 * Last complete archive entry (1\1\ ... \@), joined and stripped of whitespace
 */
export function findLastArchiveEntry(lines: string[]): string | null {
  let last: string | null = null;
  let current: string[] | null = null;

  for (const raw of lines) {
    const line = raw.trim();
    if (current === null) {
      if (!ARCHIVE_START.test(line)) {
        continue;
      }
      current = [];
    }
    current.push(line);
    if (line.endsWith('@')) {
      last = current.join('').replace(/\s+/g, '');
      current = null;
    }
  }

  return last;
}

/**
 * Atom entries of an archive entry's geometry section, or null when the
 * section is missing or a z-matrix
 */
export function archiveCoordinates(entry: string): string[] | null {
  const sections = entry.split('\\\\');
  if (sections.length < 4) {
    return null;
  }

  const atoms = sections[3]
    .split('\\')
    .filter((item) => item.length > 0)
    .filter((item, index) => !(index === 0 && CHARGE_MULTIPLICITY.test(item)))
    .filter((item) => !/^tv,/i.test(item));

  // A z-matrix starts with a bare symbol; short Cartesian entries fail in the line parser
  if (atoms.length === 0 || !atoms[0].includes(',')) {
    return null;
  }
  return atoms;
}

/**
 * Rows of the last complete Standard orientation table (between the 2nd and 3rd rules)
 */
export function findLastStandardOrientation(lines: string[]): string[] | null {
  let last: string[] | null = null;
  let current: string[] | null = null;
  let rules = 0;

  for (const raw of lines) {
    const line = raw.trim();
    if (STANDARD_ORIENTATION.test(line)) {
      current = [];
      rules = 0;
      continue;
    }
    if (current === null) {
      continue;
    }
    if (RULE.test(line)) {
      rules++;
      if (rules === 3) {
        last = current;
        current = null;
      }
      continue;
    }
    if (rules === 2 && line) {
      current.push(line);
    }
  }

  return last;
}

/**
 * Gaussian log locator (.log)
 * Normally terminated jobs read the archive (punch) entry; otherwise, or when
 * it is absent, the last Standard orientation table is used.
 */
export class GaussianLogLocator implements BlockLocator {
  locate(content: string, logger: Logger = silentLogger): RawBlock {
    const lines = splitLines(content);

    const run = runLogStateMachine({
      hasNormalTermination: () => hasNormalTermination(lines),
      findPunch: () => {
        const entry = findLastArchiveEntry(lines);
        if (entry === null) {
          return null;
        }
        const atoms = archiveCoordinates(entry);
        if (atoms === null) {
          logger.warn('Archive entry has no Cartesian coordinates, falling back to Standard orientation');
        }
        return atoms;
      },
      findStandardOrientation: () => findLastStandardOrientation(lines),
    });

    logger.debug(`Gaussian log: ${run.states.join(' -> ')}`);

    if (!run.method || !run.lines) {
      throw new ExtractionError(
        'BlockNotFound',
        'Invalid Gaussian log: no archive entry or Standard orientation table'
      );
    }

    return {
      lines: run.lines,
      layout: run.method === 'punch' ? PUNCH_LAYOUT : STANDARD_ORIENTATION_LAYOUT,
      method: run.method,
    };
  }
}

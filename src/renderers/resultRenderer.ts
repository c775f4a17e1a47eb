import { ExtractionResult } from '../models';
import { ExtractionError } from '../io/extractionError';
import { BatchReport } from '../io/batchRunner';

export type OutputFormat = 'table' | 'csv';

export interface RenderOptions {
  format: OutputFormat;
  /** Summary line only */
  compact: boolean;
}

/**
 * Renderer interface for the output formats
 */
export interface ResultRenderer {
  render(result: ExtractionResult, compact: boolean): string[];
  /** Lines written between two successive results */
  separator(compact: boolean): string[];
}

/**
 * Human-readable table
 */
export class TableRenderer implements ResultRenderer {
  render(result: ExtractionResult, compact: boolean): string[] {
    const lines = [
      `Coordinates from ${result.sourcePath} | Atoms: ${result.atoms.length} | Formula: ${result.formula}`,
    ];
    if (compact) {
      return lines;
    }

    lines.push('');
    for (const atom of result.atoms) {
      const coords = [atom.x, atom.y, atom.z].map((value) => value.toFixed(10).padEnd(15));
      lines.push(`${atom.element.padEnd(8)} ${coords.join(' ')}`.trimEnd());
    }
    lines.push('');
    return lines;
  }

  separator(compact: boolean): string[] {
    return compact ? ['---'] : ['---', ''];
  }
}

/**
 * CSV with a commented summary line
 */
export class CsvRenderer implements ResultRenderer {
  render(result: ExtractionResult, compact: boolean): string[] {
    const lines = [
      `# File: ${result.sourcePath}, Atoms: ${result.atoms.length}, Formula: ${result.formula}`,
    ];
    if (compact) {
      return lines;
    }

    lines.push('Element,X,Y,Z');
    for (const atom of result.atoms) {
      lines.push(`${atom.element},${atom.x.toFixed(10)},${atom.y.toFixed(10)},${atom.z.toFixed(10)}`);
    }
    return lines;
  }

  separator(): string[] {
    return [];
  }
}

const RENDERER_MAP: Record<OutputFormat, ResultRenderer> = {
  table: new TableRenderer(),
  csv: new CsvRenderer(),
};

export function renderResult(result: ExtractionResult, options: RenderOptions): string[] {
  return RENDERER_MAP[options.format].render(result, options.compact);
}

/**
 * One diagnostic line for a failed file
 */
export function renderFailure(error: ExtractionError): string {
  return `Error: ${error.path ?? '<unknown>'}: [${error.kind}] ${error.message}`;
}

/**
 * Successful results of a batch, in input order
 */
export function renderReport(report: BatchReport, options: RenderOptions): string[] {
  const renderer = RENDERER_MAP[options.format];
  const lines: string[] = [];
  report.successes.forEach((result, index) => {
    if (index > 0) {
      lines.push(...renderer.separator(options.compact));
    }
    lines.push(...renderer.render(result, options.compact));
  });
  return lines;
}

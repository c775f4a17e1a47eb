import { normalizeSymbolCase } from './elementData';

/**
 * Anything carrying an element symbol
 */
export interface HasElement {
  element: string;
}

/**
 * Count atoms per case-normalised element symbol
 */
export function countElements(atoms: readonly HasElement[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const atom of atoms) {
    const symbol = normalizeSymbolCase(atom.element);
    counts.set(symbol, (counts.get(symbol) ?? 0) + 1);
  }
  return counts;
}

/**
 * Hill order: C then H when carbon is present, everything else alphabetical.
 * Without carbon all symbols (H included) are alphabetical.
 */
export function hillOrder(symbols: Iterable<string>): string[] {
  const sorted = [...symbols].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  if (!sorted.includes('C')) {
    return sorted;
  }
  const rest = sorted.filter((symbol) => symbol !== 'C' && symbol !== 'H');
  return sorted.includes('H') ? ['C', 'H', ...rest] : ['C', ...rest];
}

/**
 * Molecular formula in Hill notation, counts of 1 omitted.
 * An empty atom list gives an empty string.
 */
export function generateFormula(atoms: readonly HasElement[]): string {
  const counts = countElements(atoms);
  return hillOrder(counts.keys())
    .map((symbol) => {
      const count = counts.get(symbol) ?? 0;
      return count > 1 ? `${symbol}${count}` : symbol;
    })
    .join('');
}

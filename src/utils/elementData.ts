import ELEMENT_SYMBOLS from './elements.json';

const SYMBOL_LOOKUP = new Map<string, string>(
  ELEMENT_SYMBOLS.map((symbol) => [symbol.toUpperCase(), symbol])
);

// Letters, then a label suffix: H1, C_a, C-CA--0.1, C(Fragment=1)
const LABELLED_SYMBOL = /^([A-Za-z]{1,2})[\d_\-(].*$/;
const ALPHABETIC = /^[A-Za-z]+$/;

// Gaussian ghost atom and dummy atom
const PSEUDO_SYMBOLS = new Set(['Bq', 'X']);

/**
 * Symbol for an atomic number (1-based), or null when out of range
 */
export function symbolForAtomicNumber(atomicNumber: number): string | null {
  if (!Number.isInteger(atomicNumber) || atomicNumber < 1) {
    return null;
  }
  return ELEMENT_SYMBOLS[atomicNumber - 1] ?? null;
}

/**
 * Resolve an element token to the symbol reported for the atom.
 * Atomic numbers map to symbols and keep their digits when out of range (0 for ghost atoms).
 * Purely alphabetic tokens that are no element (Bq, X) are kept case-normalised.
 * Returns null only for tokens that are neither a number, a symbol nor a labelled symbol.
 */
export function parseElement(token: string): string | null {
  const trimmed = token.trim();
  if (!trimmed) {
    return null;
  }

  if (/^\d+$/.test(trimmed)) {
    const atomicNumber = parseInt(trimmed, 10);
    return symbolForAtomicNumber(atomicNumber) ?? String(atomicNumber);
  }

  if (ALPHABETIC.test(trimmed)) {
    return SYMBOL_LOOKUP.get(trimmed.toUpperCase()) ?? normalizeSymbolCase(trimmed);
  }

  const match = trimmed.match(LABELLED_SYMBOL);
  if (!match) {
    return null;
  }
  const letters = match[1];
  const exact = SYMBOL_LOOKUP.get(letters.toUpperCase());
  if (exact) {
    return exact;
  }
  const symbol = normalizeSymbolCase(letters);
  if (PSEUDO_SYMBOLS.has(symbol) || letters.length === 1) {
    return symbol;
  }
  // Labelled two-letter names that are no element, e.g. HA1 or CB_2
  return SYMBOL_LOOKUP.get(letters[0].toUpperCase()) ?? symbol;
}

/**
 * Case-normalise a symbol without checking it against the table
 */
export function normalizeSymbolCase(symbol: string): string {
  const trimmed = symbol.trim();
  if (!trimmed) {
    return trimmed;
  }
  return trimmed[0].toUpperCase() + trimmed.slice(1).toLowerCase();
}

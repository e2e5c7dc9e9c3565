/**
 * Display symbols for connectives and constants. These only affect how a
 * formula is printed; parsing and evaluation never consult them.
 */
export type SymbolKey =
  | 'Not'
  | 'And'
  | 'Or'
  | 'Implies'
  | 'Iff'
  | 'Xor'
  | 'True'
  | 'False';

export type SymbolTable = Readonly<Record<SymbolKey, string>>;

/**
 * Plain-text symbols. Output rendered with this table can be fed back to the
 * parser's default syntax.
 */
export const ASCII_SYMBOLS: SymbolTable = {
  Not: '~',
  And: '&',
  Or: '|',
  Implies: '->',
  Iff: '<->',
  Xor: '^',
  True: 'true',
  False: 'false',
};

export const UNICODE_SYMBOLS: SymbolTable = {
  Not: '¬',
  And: '∧',
  Or: '∨',
  Implies: '→',
  Iff: '↔',
  Xor: '⊕',
  True: '⊤',
  False: '⊥',
};

/** LaTeX math-mode commands. */
export const LATEX_SYMBOLS: SymbolTable = {
  Not: '\\lnot ',
  And: '\\land',
  Or: '\\lor',
  Implies: '\\rightarrow',
  Iff: '\\leftrightarrow',
  Xor: '\\oplus',
  True: '\\top',
  False: '\\bot',
};

/**
 * Derives a symbol table from `base`, replacing only the given entries.
 */
export function withSymbols(
  base: SymbolTable,
  overrides: Partial<SymbolTable>
): SymbolTable {
  return { ...base, ...overrides };
}

import { Formula, getAtoms } from './ast';
import { Interpretation, evaluateToBoolean } from './evaluate';
import { debugLogger, LogComponent } from './debug-logger';
import { renderFormula } from './parse';
import { SymbolTable, UNICODE_SYMBOLS } from './symbols';

export type TruthTableRow = {
  readonly interpretation: Interpretation;
  readonly value: boolean;
};

export type TruthTable = {
  /** The formula's atoms in code-unit order; the first varies slowest. */
  readonly atoms: readonly string[];
  readonly rows: readonly TruthTableRow[];
};

/**
 * Returns the formula's atoms sorted by code unit, so that tables do not
 * depend on locale.
 */
export function sortedAtoms(f: Formula): string[] {
  return getAtoms(f).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Yields every total interpretation of the given atoms in binary counting
 * order, with false as 0 and the first atom as the most significant bit.
 */
export function* enumerateInterpretations(
  atoms: readonly string[]
): Generator<Interpretation> {
  const n = atoms.length;
  const values: boolean[] = new Array<boolean>(n).fill(false);
  while (true) {
    yield new Map(atoms.map((a, i): [string, boolean] => [a, values[i]]));

    let i = n - 1;
    while (i >= 0 && values[i]) {
      values[i] = false;
      i--;
    }
    if (i < 0) return;
    values[i] = true;
  }
}

/**
 * Evaluates the formula under every interpretation of its atoms. A formula
 * without atoms has a single row.
 */
export function getTruthTable(f: Formula): TruthTable {
  const atoms = sortedAtoms(f);
  const rows: TruthTableRow[] = [];
  for (const interpretation of enumerateInterpretations(atoms)) {
    rows.push({ interpretation, value: evaluateToBoolean(f, interpretation) });
  }
  debugLogger.debug(
    LogComponent.TRUTH_TABLE,
    () => `${rows.length} rows for ${renderFormula(f)}`
  );
  return { atoms, rows };
}

/**
 * Renders a truth table as aligned text, one line per row, with `T` and `F`
 * for the truth values and the formula itself as the last column heading.
 */
export function renderTruthTable(
  f: Formula,
  table: TruthTable = getTruthTable(f),
  symbols: SymbolTable = UNICODE_SYMBOLS
): string {
  const headings = [...table.atoms, renderFormula(f, symbols)];
  const cell = (value: boolean, width: number) =>
    (value ? 'T' : 'F').padEnd(width);

  const lines = [headings.join(' | ')];
  lines.push(headings.map((h) => '-'.repeat(h.length)).join('-+-'));
  for (const row of table.rows) {
    const cells = table.atoms.map((a, i) =>
      cell(row.interpretation.get(a) === true, headings[i].length)
    );
    cells.push(row.value ? 'T' : 'F');
    lines.push(cells.join(' | '));
  }
  return lines.join('\n');
}

import { Formula, iff, not } from './ast';
import { Interpretation, evaluateToBoolean } from './evaluate';
import { enumerateInterpretations, sortedAtoms } from './truth-table';
import { debugLogger, LogComponent } from './debug-logger';

export interface DecisionOptions {
  /**
   * Refuses to enumerate formulas with more distinct atoms than this, since
   * the cost doubles with every atom. Unlimited by default.
   */
  maxAtoms?: number;
}

/**
 * Represents a decision procedure refusing a formula with too many atoms.
 */
export class AtomLimitExceededError extends Error {
  constructor(
    public readonly count: number,
    public readonly limit: number
  ) {
    super(
      `formula has ${count} distinct atoms, which exceeds the limit of ${limit}`
    );
  }
}

function atomsWithin(f: Formula, opts?: DecisionOptions): string[] {
  const atoms = sortedAtoms(f);
  if (opts?.maxAtoms != null && atoms.length > opts.maxAtoms) {
    throw new AtomLimitExceededError(atoms.length, opts.maxAtoms);
  }
  return atoms;
}

/**
 * Searches the interpretations of the formula's atoms, in truth-table order,
 * for one under which the formula has the given value.
 */
function findInterpretation(
  f: Formula,
  value: boolean,
  opts?: DecisionOptions
): Interpretation | undefined {
  const atoms = atomsWithin(f, opts);
  let checked = 0;
  for (const interp of enumerateInterpretations(atoms)) {
    checked++;
    if (evaluateToBoolean(f, interp) === value) {
      debugLogger.trace(
        LogComponent.DECIDE,
        `found ${value} row after ${checked} of ${2 ** atoms.length}`
      );
      return interp;
    }
  }
  debugLogger.trace(
    LogComponent.DECIDE,
    `no ${value} row among ${checked} interpretations`
  );
  return undefined;
}

function collectInterpretations(
  f: Formula,
  value: boolean,
  opts?: DecisionOptions
): Interpretation[] {
  const atoms = atomsWithin(f, opts);
  const out: Interpretation[] = [];
  for (const interp of enumerateInterpretations(atoms)) {
    if (evaluateToBoolean(f, interp) === value) out.push(interp);
  }
  return out;
}

/**
 * Returns true if the formula is true under every interpretation.
 */
export function isTautology(f: Formula, opts?: DecisionOptions): boolean {
  return findInterpretation(f, false, opts) === undefined;
}

/**
 * Returns true if the formula is false under every interpretation.
 */
export function isContradiction(f: Formula, opts?: DecisionOptions): boolean {
  return isTautology(not(f), opts);
}

/**
 * Returns true if the formula is true under at least one interpretation.
 */
export function isSatisfiable(f: Formula, opts?: DecisionOptions): boolean {
  return !isContradiction(f, opts);
}

/**
 * Returns true if the formula is false under at least one interpretation.
 */
export function isFalsifiable(f: Formula, opts?: DecisionOptions): boolean {
  return !isTautology(f, opts);
}

/**
 * Returns true if both formulas have the same truth value under every
 * interpretation of their combined atoms.
 */
export function isEquivalent(
  f: Formula,
  g: Formula,
  opts?: DecisionOptions
): boolean {
  return isTautology(iff(f, g), opts);
}

/**
 * Every interpretation of the formula's atoms that makes it true, in
 * truth-table order.
 */
export function getSatisfyingInterpretations(
  f: Formula,
  opts?: DecisionOptions
): Interpretation[] {
  return collectInterpretations(f, true, opts);
}

/**
 * Every interpretation of the formula's atoms that makes it false, in
 * truth-table order.
 */
export function getFalsifyingInterpretations(
  f: Formula,
  opts?: DecisionOptions
): Interpretation[] {
  return collectInterpretations(f, false, opts);
}

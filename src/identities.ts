import { Formula } from './ast';
import { parseFormula } from './parse';

/**
 * Standard equivalences of propositional logic, each written as a
 * biconditional over the atoms `φ`, `ψ` and `χ`. Every entry is a
 * tautology, and `substitute` instantiates one for particular formulas.
 */
export const IDENTITY_NAMES = [
  'doubleNegation',
  'idempotentAnd',
  'idempotentOr',
  'commutativeAnd',
  'commutativeOr',
  'associativeAnd',
  'associativeOr',
  'distributiveAnd',
  'distributiveOr',
  'deMorganAnd',
  'deMorganOr',
  'absorptionAnd',
  'absorptionOr',
  'materialImplication',
  'contraposition',
  'biconditional',
  'exclusiveOr',
] as const;

export type IdentityName = (typeof IDENTITY_NAMES)[number];

const SOURCES: Readonly<Record<IdentityName, string>> = {
  doubleNegation: '~~φ <-> φ',
  idempotentAnd: 'φ & φ <-> φ',
  idempotentOr: 'φ | φ <-> φ',
  commutativeAnd: 'φ & ψ <-> ψ & φ',
  commutativeOr: 'φ | ψ <-> ψ | φ',
  associativeAnd: '(φ & ψ) & χ <-> φ & (ψ & χ)',
  associativeOr: '(φ | ψ) | χ <-> φ | (ψ | χ)',
  distributiveAnd: 'φ & (ψ | χ) <-> (φ & ψ) | (φ & χ)',
  distributiveOr: 'φ | (ψ & χ) <-> (φ | ψ) & (φ | χ)',
  deMorganAnd: '~(φ & ψ) <-> ~φ | ~ψ',
  deMorganOr: '~(φ | ψ) <-> ~φ & ~ψ',
  absorptionAnd: 'φ & (φ | ψ) <-> φ',
  absorptionOr: 'φ | (φ & ψ) <-> φ',
  materialImplication: '(φ -> ψ) <-> ~φ | ψ',
  contraposition: '(φ -> ψ) <-> (~ψ -> ~φ)',
  biconditional: '(φ <-> ψ) <-> (φ & ψ) | (~φ & ~ψ)',
  exclusiveOr: '(φ ^ ψ) <-> ~(φ <-> ψ)',
};

const cache: Map<IdentityName, Formula> = new Map();

/**
 * Returns the named identity as a formula.
 */
export function identity(name: IdentityName): Formula {
  let f = cache.get(name);
  if (f === undefined) {
    f = parseFormula(SOURCES[name]);
    cache.set(name, f);
  }
  return f;
}

/**
 * Formulas shared by the property-style tests. They cover every connective,
 * constants, nesting, repeated atoms and the associativity corner cases.
 */
export const SAMPLE_FORMULAS: readonly string[] = [
  'P',
  'true',
  '~false',
  '~~P',
  'P & Q',
  'P | ~P',
  'P & ~P',
  'P -> Q',
  'P -> Q -> R',
  '(P -> Q) -> R',
  'P <-> Q',
  'P ^ Q',
  'P <-> Q <-> R',
  'P ^ Q ^ R',
  '(P -> Q) <-> R',
  'P & (Q -> R)',
  '~(P & Q) | R',
  '(P & true) | false',
  '(P | Q) & (P | R) & ~Q',
  '~(P <-> ~Q) & (R ^ S)',
  '((P & Q) | R) -> (S <-> ~T)',
  '(P -> Q) & (Q -> R) -> (P -> R)',
  'P & (P | Q) | (R & ~R)',
  '~(~P | (Q & ~(R -> P)))',
  '(A ^ B) & (B ^ C) & (A <-> C)',
];

export {
  NodeKind,
  type Const,
  type Atom,
  type Not,
  type And,
  type Or,
  type Implies,
  type Iff,
  type Xor,
  type Binary,
  type BinaryKind,
  type Formula,
  type Substitution,
  type TransformFns,
  InvalidAtomNameError,
  TRUE,
  FALSE,
  constant,
  atom,
  not,
  and,
  or,
  implies,
  iff,
  xor,
  binary,
  conjunction,
  disjunction,
  isValidAtomName,
  RESERVED_WORDS,
  isAtomic,
  isBinary,
  isLiteral,
  transform,
  equal,
  getAtoms,
  getSubformulas,
  size,
  depth,
  contains,
  substitute,
} from './ast';
export {
  TokenKind,
  type SpelledTokenKind,
  type Syntax,
  type Token,
  type ParseResult,
  DEFAULT_SYNTAX,
  extendSyntax,
  FormulaSyntaxError,
  Lexer,
  Parser,
  MAX_NESTING,
  parseFormula,
  tryParseFormula,
  renderFormula,
} from './parse';
export {
  type SymbolKey,
  type SymbolTable,
  ASCII_SYMBOLS,
  UNICODE_SYMBOLS,
  LATEX_SYMBOLS,
  withSymbols,
} from './symbols';
export {
  type Interpretation,
  UnboundAtomError,
  interpretation,
  evaluate,
  evaluateToBoolean,
} from './evaluate';
export { simplify } from './simplify';
export {
  eliminateIffAndXor,
  transformImpliesToOr,
  pushNegationsDown,
  removeDoubleNegations,
  distributeOrOverAnd,
  distributeAndOverOr,
  toNNF,
  toCNF,
  toDNF,
  isNNF,
  isCNF,
  isDNF,
} from './cnf';
export {
  type DecisionOptions,
  AtomLimitExceededError,
  isTautology,
  isContradiction,
  isSatisfiable,
  isFalsifiable,
  isEquivalent,
  getSatisfyingInterpretations,
  getFalsifyingInterpretations,
} from './decide';
export {
  type TruthTable,
  type TruthTableRow,
  sortedAtoms,
  enumerateInterpretations,
  getTruthTable,
  renderTruthTable,
} from './truth-table';
export { type IdentityName, IDENTITY_NAMES, identity } from './identities';
export {
  DebugLogger,
  LogLevel,
  LogComponent,
  type LogMessage,
  debugLogger,
} from './debug-logger';

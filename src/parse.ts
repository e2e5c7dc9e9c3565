import {
  Formula,
  NodeKind,
  atom,
  isValidAtomName,
  and,
  or,
  not,
  implies,
  iff,
  xor,
  TRUE,
  FALSE,
} from './ast';
import { debugLogger, LogComponent } from './debug-logger';
import { SymbolTable, UNICODE_SYMBOLS } from './symbols';

/**
 * Token types for the lexer.
 */
export enum TokenKind {
  // Literals
  IDENTIFIER = 'IDENTIFIER',
  TRUE = 'TRUE',
  FALSE = 'FALSE',

  // Operators – precedence (highest ➜ lowest): NOT > AND > OR > IMPLIES = IFF = XOR
  NOT = 'NOT',
  AND = 'AND',
  OR = 'OR',
  IMPLIES = 'IMPLIES', // right‑associative
  IFF = 'IFF', // left‑associative
  XOR = 'XOR', // left‑associative

  // Punctuation
  LPAREN = 'LPAREN', // (
  RPAREN = 'RPAREN', // )

  // Special
  EOF = 'EOF',
}

/**
 * Token kinds whose concrete spelling can be configured.
 */
export type SpelledTokenKind =
  | TokenKind.TRUE
  | TokenKind.FALSE
  | TokenKind.NOT
  | TokenKind.AND
  | TokenKind.OR
  | TokenKind.IMPLIES
  | TokenKind.IFF
  | TokenKind.XOR;

/**
 * Concrete syntax accepted by the lexer: every spelling of each configurable
 * token. Spellings made of identifier characters are keywords and are matched
 * as whole words, case-sensitively; any other spelling is matched wherever it
 * appears, longest first.
 */
export type Syntax = Readonly<Record<SpelledTokenKind, readonly string[]>>;

export const DEFAULT_SYNTAX: Syntax = {
  [TokenKind.TRUE]: ['true', '⊤'],
  [TokenKind.FALSE]: ['false', '⊥'],
  [TokenKind.NOT]: ['~', '!', '¬', 'not'],
  [TokenKind.AND]: ['&', '∧', 'and'],
  [TokenKind.OR]: ['|', '∨', 'or'],
  [TokenKind.IMPLIES]: ['->', '>>', '→', 'implies'],
  [TokenKind.IFF]: ['<->', '<=>', '↔', 'iff'],
  [TokenKind.XOR]: ['^', '⊕', 'xor'],
};

/**
 * Returns a syntax that accepts everything `base` does plus the given extra
 * spellings.
 */
export function extendSyntax(
  base: Syntax,
  extra: Partial<Record<SpelledTokenKind, readonly string[]>>
): Syntax {
  const out: Record<SpelledTokenKind, readonly string[]> = { ...base };
  for (const kind of SPELLED_KINDS) {
    const more = extra[kind];
    if (more) out[kind] = [...base[kind], ...more];
  }
  return out;
}

const SPELLED_KINDS: readonly SpelledTokenKind[] = [
  TokenKind.TRUE,
  TokenKind.FALSE,
  TokenKind.NOT,
  TokenKind.AND,
  TokenKind.OR,
  TokenKind.IMPLIES,
  TokenKind.IFF,
  TokenKind.XOR,
];

export interface Token {
  kind: TokenKind;
  value: string;
  pos: number;
}

/**
 * Represents malformed formula text. `pos` is the offset of the offending
 * character in the input.
 */
export class FormulaSyntaxError extends Error {
  constructor(
    public readonly reason: string,
    public readonly pos: number
  ) {
    super(`${reason} at position ${pos}`);
  }
}

// identifiers and word spellings share the atom-name alphabet
const IDENTIFIER = /[\p{L}_][\p{L}\p{N}_]*/uy;
const WORD = /^[\p{L}_][\p{L}\p{N}_]*$/u;
const ENDS_IN_WORD_CHAR = /[\p{L}\p{N}_]$/u;

export class Lexer {
  private pos = 0;
  private readonly keywords: Map<string, SpelledTokenKind> = new Map();
  private readonly operators: [string, SpelledTokenKind][] = [];

  constructor(
    private readonly input: string,
    syntax: Syntax = DEFAULT_SYNTAX
  ) {
    const owner: Map<string, SpelledTokenKind> = new Map();
    for (const kind of SPELLED_KINDS) {
      for (const spelling of syntax[kind]) {
        if (spelling.length === 0 || /\s|[()]/.test(spelling)) {
          throw new Error(
            `invalid spelling '${spelling}' for ${kind}: spellings must be non-empty and contain no whitespace or parentheses`
          );
        }
        const existing = owner.get(spelling);
        if (existing !== undefined && existing !== kind) {
          throw new Error(
            `spelling '${spelling}' is assigned to both ${existing} and ${kind}`
          );
        }
        owner.set(spelling, kind);
      }
    }

    for (const [spelling, kind] of owner) {
      if (WORD.test(spelling)) this.keywords.set(spelling, kind);
      else this.operators.push([spelling, kind]);
    }
    this.operators.sort((a, b) => b[0].length - a[0].length);
  }

  private skipWs(): void {
    while (this.pos < this.input.length && /\s/.test(this.input[this.pos]))
      this.pos++;
  }

  private readIdentifier(): string | undefined {
    IDENTIFIER.lastIndex = this.pos;
    const m = IDENTIFIER.exec(this.input);
    if (m === null) return undefined;
    this.pos += m[0].length;
    return m[0];
  }

  public nextToken(): Token {
    this.skipWs();
    const start = this.pos;
    if (start >= this.input.length)
      return { kind: TokenKind.EOF, value: '', pos: start };

    switch (this.input[start]) {
      case '(':
        this.pos++;
        return { kind: TokenKind.LPAREN, value: '(', pos: start };
      case ')':
        this.pos++;
        return { kind: TokenKind.RPAREN, value: ')', pos: start };
    }

    const id = this.readIdentifier();
    if (id !== undefined) {
      const keyword = this.keywords.get(id);
      return { kind: keyword ?? TokenKind.IDENTIFIER, value: id, pos: start };
    }

    for (const [spelling, kind] of this.operators) {
      if (this.input.startsWith(spelling, start)) {
        this.pos += spelling.length;
        return { kind, value: spelling, pos: start };
      }
    }

    // report the whole code point, not half of a surrogate pair
    const [ch] = this.input.slice(start, start + 2);
    throw new FormulaSyntaxError(`unexpected character '${ch}'`, start);
  }

  /**
   * Reads every remaining token, ending with (and including) EOF.
   */
  public tokenize(): Token[] {
    const tokens: Token[] = [];
    let t;
    do {
      t = this.nextToken();
      tokens.push(t);
    } while (t.kind !== TokenKind.EOF);
    return tokens;
  }
}

/**
 * Deepest nesting of parentheses and right-nested implications the parser
 * accepts. Both recurse, so deeper input is rejected with a syntax error
 * rather than exhausting the call stack.
 */
export const MAX_NESTING = 500;

export class Parser {
  private current = 0;
  private nesting = 0;
  private readonly tokens: Token[];

  constructor(lexer: Lexer) {
    this.tokens = lexer.tokenize();
  }

  private peek(): Token {
    return this.tokens[Math.min(this.current, this.tokens.length - 1)];
  }

  private advance(): Token {
    const tok = this.peek();
    if (tok.kind !== TokenKind.EOF) this.current++;
    return tok;
  }

  private match(...k: TokenKind[]): boolean {
    return k.includes(this.peek().kind);
  }

  private enter(tok: Token): void {
    if (++this.nesting > MAX_NESTING)
      throw new FormulaSyntaxError(
        `formula nested more than ${MAX_NESTING} levels deep`,
        tok.pos
      );
  }

  public parseFormula(): Formula {
    const f = this.parseConnective();
    const tok = this.peek();
    if (tok.kind === TokenKind.RPAREN)
      throw new FormulaSyntaxError(`unbalanced parenthesis: unmatched ')'`, tok.pos);
    if (tok.kind !== TokenKind.EOF)
      throw new FormulaSyntaxError(
        `unexpected '${tok.value}' after end of formula`,
        tok.pos
      );
    return f;
  }

  private parseConnective(): Formula {
    let left = this.parseOr();
    while (this.match(TokenKind.IMPLIES, TokenKind.IFF, TokenKind.XOR)) {
      const op = this.advance();
      if (op.kind === TokenKind.IMPLIES) {
        this.enter(op);
        left = implies(left, this.parseConnective()); // right‑associative
        this.nesting--;
      } else {
        const right = this.parseOr();
        left = op.kind === TokenKind.IFF ? iff(left, right) : xor(left, right);
      }
    }
    return left;
  }

  private parseOr(): Formula {
    let left = this.parseAnd();
    while (this.match(TokenKind.OR)) {
      this.advance();
      left = or(left, this.parseAnd());
    }
    return left;
  }

  private parseAnd(): Formula {
    let left = this.parseNegation();
    while (this.match(TokenKind.AND)) {
      this.advance();
      left = and(left, this.parseNegation());
    }
    return left;
  }

  private parseNegation(): Formula {
    let negations = 0;
    while (this.match(TokenKind.NOT)) {
      this.advance();
      negations++;
    }
    let f = this.parsePrimary();
    for (; negations > 0; negations--) f = not(f);
    return f;
  }

  private parsePrimary(): Formula {
    const tok = this.peek();
    switch (tok.kind) {
      case TokenKind.LPAREN:
        return this.parseParenthesised();
      case TokenKind.IDENTIFIER:
        this.advance();
        // a reserved word is an identifier under a syntax that does not use it
        if (!isValidAtomName(tok.value))
          throw new FormulaSyntaxError(
            `'${tok.value}' is a reserved word and cannot name an atom`,
            tok.pos
          );
        return atom(tok.value);
      case TokenKind.TRUE:
        this.advance();
        return TRUE;
      case TokenKind.FALSE:
        this.advance();
        return FALSE;
      case TokenKind.EOF:
        throw new FormulaSyntaxError(
          'expected operand but reached end of input',
          tok.pos
        );
      case TokenKind.RPAREN:
        throw new FormulaSyntaxError(`expected operand before ')'`, tok.pos);
      default:
        throw new FormulaSyntaxError(
          `expected operand but found '${tok.value}'`,
          tok.pos
        );
    }
  }

  private parseParenthesised(): Formula {
    const open = this.advance();
    this.enter(open);
    const f = this.parseConnective();
    const tok = this.peek();
    if (tok.kind === TokenKind.EOF)
      throw new FormulaSyntaxError(
        `unbalanced parenthesis: '(' at position ${open.pos} is never closed`,
        tok.pos
      );
    if (tok.kind !== TokenKind.RPAREN)
      throw new FormulaSyntaxError(`expected ')' but found '${tok.value}'`, tok.pos);
    this.advance();
    this.nesting--;
    return f;
  }
}

/**
 * Parses a formula, throwing `FormulaSyntaxError` if the text is malformed.
 */
export function parseFormula(input: string, syntax?: Syntax): Formula {
  const f = new Parser(new Lexer(input, syntax)).parseFormula();
  debugLogger.trace(LogComponent.PARSER, () => `parsed '${input}'`);
  return f;
}

export type ParseResult =
  | { ok: true; formula: Formula }
  | { ok: false; error: FormulaSyntaxError };

/**
 * Like `parseFormula`, but returns syntax errors as values.
 */
export function tryParseFormula(input: string, syntax?: Syntax): ParseResult {
  try {
    return { ok: true, formula: parseFormula(input, syntax) };
  } catch (err) {
    if (err instanceof FormulaSyntaxError) {
      debugLogger.debug(LogComponent.PARSER, err.message);
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * Precedence map for *rendering* (used to decide when brackets are needed).
 * It must mirror the parsing precedence defined above.
 */
const PREC = {
  [NodeKind.Const]: 5,
  [NodeKind.Atom]: 5,
  [NodeKind.Not]: 4,
  [NodeKind.And]: 3,
  [NodeKind.Or]: 2,
  [NodeKind.Implies]: 1,
  [NodeKind.Iff]: 1,
  [NodeKind.Xor]: 1,
} as const;

function needsParens(
  child: Formula,
  parent: Formula,
  side: 'left' | 'right'
): boolean {
  const cp = PREC[child.kind];
  const pp = PREC[parent.kind];
  if (cp < pp) return true; // lower precedence needs parentheses
  if (cp > pp) return false;
  switch (parent.kind) {
    // AND / OR are left‑associative
    case NodeKind.And:
    case NodeKind.Or:
      return side === 'right';
    // Implication is right‑associative
    case NodeKind.Implies:
      return side === 'left' || child.kind !== NodeKind.Implies;
    case NodeKind.Iff:
    case NodeKind.Xor:
      return side === 'right' || child.kind !== parent.kind;
    default:
      return false;
  }
}

/**
 * Renders a formula as text with the minimum of parentheses. Output rendered
 * with `ASCII_SYMBOLS` parses back to an equal formula.
 */
export function renderFormula(
  f: Formula,
  symbols: SymbolTable = UNICODE_SYMBOLS
): string {
  const spaced = (op: string) => ` ${op} `;
  const negation = ENDS_IN_WORD_CHAR.test(symbols.Not)
    ? `${symbols.Not} `
    : symbols.Not;

  const rec = (phi: Formula, parent?: Formula, side?: 'left' | 'right'): string => {
    const paren = parent && side && needsParens(phi, parent, side);
    let out: string;
    switch (phi.kind) {
      case NodeKind.Const:
        out = phi.value ? symbols.True : symbols.False;
        break;
      case NodeKind.Atom:
        out = phi.name;
        break;
      case NodeKind.Not: {
        const arg = rec(phi.arg);
        out = negation + (PREC[phi.arg.kind] < PREC[NodeKind.Not] ? `(${arg})` : arg);
        break;
      }
      case NodeKind.And:
        out = rec(phi.left, phi, 'left') + spaced(symbols.And) + rec(phi.right, phi, 'right');
        break;
      case NodeKind.Or:
        out = rec(phi.left, phi, 'left') + spaced(symbols.Or) + rec(phi.right, phi, 'right');
        break;
      case NodeKind.Implies:
        out = rec(phi.left, phi, 'left') + spaced(symbols.Implies) + rec(phi.right, phi, 'right');
        break;
      case NodeKind.Iff:
        out = rec(phi.left, phi, 'left') + spaced(symbols.Iff) + rec(phi.right, phi, 'right');
        break;
      case NodeKind.Xor:
        out = rec(phi.left, phi, 'left') + spaced(symbols.Xor) + rec(phi.right, phi, 'right');
        break;
      default:
        const _exhaustive: never = phi;
        throw new Error(`Unknown formula kind ${_exhaustive}`);
    }
    return paren ? `(${out})` : out;
  };
  return rec(f);
}

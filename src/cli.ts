#!/usr/bin/env node

import { Formula, getAtoms, getSubformulas } from './ast';
import { parseFormula, renderFormula } from './parse';
import { Interpretation, evaluate } from './evaluate';
import { simplify } from './simplify';
import { toCNF, toDNF, toNNF } from './cnf';
import {
  isTautology,
  isContradiction,
  isSatisfiable,
  isFalsifiable,
  isEquivalent,
} from './decide';
import { renderTruthTable } from './truth-table';
import {
  ASCII_SYMBOLS,
  LATEX_SYMBOLS,
  SymbolTable,
  UNICODE_SYMBOLS,
} from './symbols';
import { debugLogger, LogComponent } from './debug-logger';

export const USAGE = `Usage: proplogic [COMMAND] [OPTIONS] <formula>

COMMANDS:
  parse                Parse and pretty-print a formula
  atoms                List the atoms of a formula
  subformulas          List every subformula, one per line
  eval                 Evaluate a formula under --assign
  simplify             Simplify a formula
  nnf                  Convert formula to negation normal form
  cnf                  Convert formula to CNF
  dnf                  Convert formula to DNF
  table                Print the truth table of a formula
  check                Report tautology, contradiction, satisfiability
  equiv                Check whether two formulas are equivalent
  help                 Show this help message

OPTIONS:
  -h, --help           Show help message
  -a, --ascii          Print with ASCII connectives
  --latex              Print with LaTeX commands
  --assign <list>      Truth values for eval, e.g. P=true,Q=0

EXAMPLES:
  proplogic parse "P & (Q -> R)"
  proplogic eval --assign P=1,Q=0,R=1 "P & (Q -> R)"
  proplogic cnf "(P <-> Q) | R"
  proplogic equiv "~(P & Q)" "~P | ~Q"
  proplogic parse table       (a formula spelled like a command needs "parse")

FORMULA SYNTAX:
  Atoms:              P, Q, rain, x_1, φ, ...
  Constants:          true, false or ⊤, ⊥
  Negation:           ~P, !P, ¬P or not P
  Conjunction:        P & Q, P ∧ Q or P and Q
  Disjunction:        P | Q, P ∨ Q or P or Q
  Implication:        P -> Q, P >> Q, P → Q or P implies Q
  Biconditional:      P <-> Q, P <=> Q, P ↔ Q or P iff Q
  Exclusive or:       P ^ Q, P ⊕ Q or P xor Q
`;

export interface Output {
  out(line: string): void;
  err(line: string): void;
}

const consoleOutput: Output = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const COMMANDS = [
  'parse',
  'atoms',
  'subformulas',
  'eval',
  'simplify',
  'nnf',
  'cnf',
  'dnf',
  'table',
  'check',
  'equiv',
] as const;

type Command = (typeof COMMANDS)[number];

function isCommand(s: string): s is Command {
  return COMMANDS.some((c) => c === s);
}

class UsageError extends Error {}

/**
 * Parses `P=true,Q=0` into an interpretation.
 */
export function parseAssignment(list: string): Interpretation {
  const out: Map<string, boolean> = new Map();
  for (const item of list.split(',')) {
    const [name, value, ...rest] = item.split('=').map((s) => s.trim());
    if (!name || value === undefined || rest.length > 0) {
      throw new UsageError(`invalid assignment '${item}', expected NAME=VALUE`);
    }
    switch (value.toLowerCase()) {
      case 'true':
      case 't':
      case '1':
        out.set(name, true);
        break;
      case 'false':
      case 'f':
      case '0':
        out.set(name, false);
        break;
      default:
        throw new UsageError(`invalid truth value '${value}' for '${name}'`);
    }
  }
  return out;
}

function yesNo(b: boolean): string {
  return b ? 'yes' : 'no';
}

function execute(
  command: Command,
  formulas: Formula[],
  assignment: Interpretation,
  symbols: SymbolTable,
  io: Output
): void {
  const render = (f: Formula) => renderFormula(f, symbols);
  const [f] = formulas;

  switch (command) {
    case 'parse':
      io.out(render(f));
      break;
    case 'atoms':
      io.out(getAtoms(f).join(', '));
      break;
    case 'subformulas':
      for (const sub of getSubformulas(f)) io.out(render(sub));
      break;
    case 'eval':
      io.out(render(evaluate(f, assignment)));
      break;
    case 'simplify':
      io.out(render(simplify(f)));
      break;
    case 'nnf':
    case 'cnf':
    case 'dnf': {
      const convert = { nnf: toNNF, cnf: toCNF, dnf: toDNF }[command];
      io.out('Original:');
      io.out(render(f));
      io.out('');
      io.out(`${command.toUpperCase()}:`);
      io.out(render(convert(f)));
      break;
    }
    case 'table':
      io.out(renderTruthTable(f, undefined, symbols));
      break;
    case 'check':
      io.out(`tautology:     ${yesNo(isTautology(f))}`);
      io.out(`contradiction: ${yesNo(isContradiction(f))}`);
      io.out(`satisfiable:   ${yesNo(isSatisfiable(f))}`);
      io.out(`falsifiable:   ${yesNo(isFalsifiable(f))}`);
      break;
    case 'equiv':
      io.out(isEquivalent(f, formulas[1]) ? 'equivalent' : 'not equivalent');
      break;
    default: {
      const _exhaustive: never = command;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Runs the command line with the given arguments and returns the exit code.
 */
export function run(args: string[], io: Output = consoleOutput): number {
  if (args.length === 0 || args.includes('-h') || args.includes('--help')) {
    io.out(USAGE);
    return 0;
  }

  try {
    let symbols = UNICODE_SYMBOLS;
    let assignment: Interpretation = new Map();
    const positional: string[] = [];
    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      if (arg === '-a' || arg === '--ascii') {
        symbols = ASCII_SYMBOLS;
      } else if (arg === '--latex') {
        symbols = LATEX_SYMBOLS;
      } else if (arg === '--assign') {
        const list = args[++i];
        if (list === undefined) throw new UsageError('--assign needs a value');
        assignment = parseAssignment(list);
      } else if (arg.startsWith('--assign=')) {
        assignment = parseAssignment(arg.slice('--assign='.length));
      } else {
        positional.push(arg);
      }
    }

    const [first, ...rest] = positional;
    if (first === 'help') {
      io.out(USAGE);
      return 0;
    }

    // If no command given, treat first arg as formula and default to parse
    const command: Command = isCommand(first) ? first : 'parse';
    const sources = isCommand(first) ? rest : positional;
    const arity = command === 'equiv' ? 2 : 1;
    if (sources.length !== arity) {
      throw new UsageError(
        `'${command}' expects ${arity} formula argument${arity > 1 ? 's' : ''}, got ${sources.length}`
      );
    }

    debugLogger.debug(LogComponent.CLI, `running '${command}'`);
    const formulas = sources.map((s) => parseFormula(s));
    execute(command, formulas, assignment, symbols, io);
    return 0;
  } catch (error) {
    io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    if (error instanceof UsageError) {
      io.err('Use "proplogic help" for usage information');
    }
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = run(process.argv.slice(2));
}

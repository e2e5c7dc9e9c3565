import { expect } from 'chai';
import { type Formula, NodeKind, TRUE, FALSE, atom, not, and, or, equal, contains, getSubformulas } from './ast';
import {
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
import { parseFormula } from './parse';
import { isEquivalent } from './decide';
import { SAMPLE_FORMULAS } from './test-fixtures';

const P = atom('P');
const Q = atom('Q');
const R = atom('R');

const kindsOf = (source: string, convert: (f: Formula) => Formula) =>
  new Set(getSubformulas(convert(parseFormula(source))).map((s) => s.kind));

describe('cnf.ts', () => {
  describe('steps', () => {
    it('should expand biconditionals', () => {
      const g = eliminateIffAndXor(parseFormula('P <-> Q'));
      expect(equal(g, or(and(P, Q), and(not(P), not(Q))))).to.be.true;
    });

    it('should expand exclusive disjunctions as negated biconditionals', () => {
      const g = eliminateIffAndXor(parseFormula('P ^ Q'));
      expect(equal(g, not(or(and(P, Q), and(not(P), not(Q)))))).to.be.true;
    });

    it('should expand nested biconditionals inside their operands', () => {
      const g = eliminateIffAndXor(parseFormula('(P <-> Q) <-> R'));
      expect(contains(g, parseFormula('(P & Q) | (~P & ~Q)'))).to.be.true;
      expect(getSubformulas(g).some((s) => s.kind === NodeKind.Iff)).to.be.false;
    });

    it('should convert implications to disjunctions', () => {
      const g = transformImpliesToOr(parseFormula('P -> Q'));
      expect(equal(g, or(not(P), Q))).to.be.true;
    });

    it('should convert nested implications', () => {
      const g = transformImpliesToOr(parseFormula('(P -> Q) -> R'));
      expect(equal(g, or(not(or(not(P), Q)), R))).to.be.true;
    });

    it('should push negations through conjunctions and disjunctions', () => {
      expect(equal(pushNegationsDown(parseFormula('~(P & Q)')), or(not(P), not(Q)))).to.be.true;
      expect(equal(pushNegationsDown(parseFormula('~(P | Q)')), and(not(P), not(Q)))).to.be.true;
      // double negations are left for removeDoubleNegations
      expect(
        equal(pushNegationsDown(parseFormula('~(P & ~(Q | R))')), or(not(P), or(not(not(Q)), not(not(R)))))
      ).to.be.true;
    });

    it('should fold negated constants', () => {
      expect(pushNegationsDown(parseFormula('~true'))).to.equal(FALSE);
      expect(equal(pushNegationsDown(parseFormula('~(P & false)')), or(not(P), TRUE))).to.be.true;
    });

    it('should remove double negations', () => {
      expect(equal(removeDoubleNegations(parseFormula('~~P & ~~~Q')), and(P, not(Q)))).to.be.true;
    });

    it('should distribute disjunctions over conjunctions on either side', () => {
      expect(equal(distributeOrOverAnd(parseFormula('P | (Q & R)')), and(or(P, Q), or(P, R)))).to.be.true;
      expect(equal(distributeOrOverAnd(parseFormula('(Q & R) | P')), and(or(Q, P), or(R, P)))).to.be.true;
    });

    it('should distribute conjunctions over disjunctions on either side', () => {
      expect(equal(distributeAndOverOr(parseFormula('P & (Q | R)')), or(and(P, Q), and(P, R)))).to.be.true;
      expect(equal(distributeAndOverOr(parseFormula('(Q | R) & P')), or(and(Q, P), and(R, P)))).to.be.true;
    });
  });

  describe('toNNF', () => {
    it('should rewrite implications', () => {
      expect(equal(toNNF(parseFormula('P -> Q')), or(not(P), Q))).to.be.true;
    });

    it('should leave negations only on atoms', () => {
      expect(equal(toNNF(parseFormula('~(P | ~Q)')), and(not(P), Q))).to.be.true;
      expect(equal(toNNF(parseFormula('~~~P')), not(P))).to.be.true;
      expect(equal(toNNF(parseFormula('P ^ Q')), parseFormula('(~P | ~Q) & (P | Q)'))).to.be.true;
      expect(equal(toNNF(parseFormula('~true | P')), or(FALSE, P))).to.be.true;
    });
  });

  describe('toCNF and toDNF', () => {
    it('should convert P -> Q to a single clause', () => {
      const g = toCNF(parseFormula('P -> Q'));
      expect(equal(g, or(not(P), Q))).to.be.true;
      expect(getSubformulas(g).some((s) => s.kind === NodeKind.Implies)).to.be.false;
    });

    it('should produce clauses', () => {
      expect(equal(toCNF(parseFormula('(P & Q) | R')), and(or(P, R), or(Q, R)))).to.be.true;
    });

    it('should produce terms', () => {
      expect(equal(toDNF(parseFormula('P & (Q | R)')), or(and(P, Q), and(P, R)))).to.be.true;
    });

    it('should keep constants as literals', () => {
      const g = toCNF(parseFormula('P & true'));
      expect(equal(g, and(P, TRUE))).to.be.true;
      expect(isCNF(g)).to.be.true;
    });

    it('should use only conjunction, disjunction and negation', () => {
      const allowed = new Set([NodeKind.Atom, NodeKind.Const, NodeKind.Not, NodeKind.And, NodeKind.Or]);
      for (const source of SAMPLE_FORMULAS) {
        for (const kind of kindsOf(source, toCNF)) expect(allowed.has(kind), source).to.be.true;
        for (const kind of kindsOf(source, toDNF)) expect(allowed.has(kind), source).to.be.true;
      }
    });
  });

  describe('recognisers', () => {
    it('should recognise negation normal form', () => {
      expect(isNNF(parseFormula('~P & (Q | ~R)'))).to.be.true;
      expect(isNNF(parseFormula('true'))).to.be.true;
      expect(isNNF(parseFormula('~(P & Q)'))).to.be.false;
      expect(isNNF(parseFormula('~~P'))).to.be.false;
      expect(isNNF(parseFormula('P -> Q'))).to.be.false;
    });

    it('should recognise conjunctive normal form', () => {
      expect(isCNF(parseFormula('(P | Q) & ~R'))).to.be.true;
      expect(isCNF(parseFormula('P'))).to.be.true;
      expect(isCNF(parseFormula('P | Q | ~R'))).to.be.true;
      expect(isCNF(parseFormula('P | (Q & R)'))).to.be.false;
      expect(isCNF(parseFormula('~~P'))).to.be.false;
      expect(isCNF(parseFormula('P -> Q'))).to.be.false;
    });

    it('should recognise disjunctive normal form', () => {
      expect(isDNF(parseFormula('(P & Q) | ~R'))).to.be.true;
      expect(isDNF(parseFormula('P & Q & ~R'))).to.be.true;
      expect(isDNF(parseFormula('P & (Q | R)'))).to.be.false;
    });
  });

  describe('properties', () => {
    it('should produce normal forms', () => {
      for (const source of SAMPLE_FORMULAS) {
        const f = parseFormula(source);
        expect(isNNF(toNNF(f)), source).to.be.true;
        expect(isCNF(toCNF(f)), source).to.be.true;
        expect(isDNF(toDNF(f)), source).to.be.true;
      }
    });

    it('should preserve meaning', () => {
      for (const source of SAMPLE_FORMULAS) {
        const f = parseFormula(source);
        expect(isEquivalent(f, toNNF(f)), source).to.be.true;
        expect(isEquivalent(f, toCNF(f)), source).to.be.true;
        expect(isEquivalent(f, toDNF(f)), source).to.be.true;
      }
    });
  });
});

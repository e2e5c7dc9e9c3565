import { expect } from 'chai';
import { simplify } from './simplify';
import { parseFormula } from './parse';
import { TRUE, FALSE, atom, not, equal, size } from './ast';
import { isEquivalent } from './decide';
import { SAMPLE_FORMULAS } from './test-fixtures';

const P = atom('P');
const simplified = (source: string) => simplify(parseFormula(source));

describe('simplify.ts', () => {
  it('removes constants', () => {
    expect(equal(simplified('(P & true) | false'), P)).to.be.true;
    expect(simplified('P & false')).to.equal(FALSE);
    expect(simplified('true | P')).to.equal(TRUE);
    expect(equal(simplified('P & (Q | true)'), P)).to.be.true;
  });

  it('folds negated constants and double negations', () => {
    expect(simplified('~true')).to.equal(FALSE);
    expect(simplified('~~false')).to.equal(FALSE);
    expect(equal(simplified('~~P'), P)).to.be.true;
    expect(equal(simplified('~~~P'), not(P))).to.be.true;
  });

  it('applies idempotence and complement', () => {
    expect(equal(simplified('P & P'), P)).to.be.true;
    expect(equal(simplified('P | P'), P)).to.be.true;
    expect(simplified('P | ~P')).to.equal(TRUE);
    expect(simplified('~P & P')).to.equal(FALSE);
  });

  it('applies absorption on either side', () => {
    expect(equal(simplified('P & (P | Q)'), P)).to.be.true;
    expect(equal(simplified('(Q | P) & P'), P)).to.be.true;
    expect(equal(simplified('P | (Q & P)'), P)).to.be.true;
    expect(equal(simplified('(P & Q) | P'), P)).to.be.true;
  });

  it('simplifies implications', () => {
    expect(simplified('P -> P')).to.equal(TRUE);
    expect(simplified('false -> P')).to.equal(TRUE);
    expect(simplified('P -> true')).to.equal(TRUE);
    expect(equal(simplified('true -> P'), P)).to.be.true;
    expect(equal(simplified('P -> false'), not(P))).to.be.true;
    expect(equal(simplified('P -> ~P'), not(P))).to.be.true;
    expect(equal(simplified('~P -> P'), P)).to.be.true;
  });

  it('simplifies biconditionals and exclusive disjunctions', () => {
    expect(simplified('P <-> P')).to.equal(TRUE);
    expect(simplified('P <-> ~P')).to.equal(FALSE);
    expect(equal(simplified('true <-> P'), P)).to.be.true;
    expect(equal(simplified('P <-> false'), not(P))).to.be.true;
    expect(simplified('P ^ P')).to.equal(FALSE);
    expect(simplified('~P ^ P')).to.equal(TRUE);
    expect(equal(simplified('false ^ P'), P)).to.be.true;
    expect(equal(simplified('P ^ true'), not(P))).to.be.true;
  });

  it('cascades rewrites up the tree', () => {
    expect(equal(simplified('(P & ~P) | Q'), atom('Q'))).to.be.true;
    expect(equal(simplified('P -> (Q & ~Q)'), not(P))).to.be.true;
    expect(simplified('~(P <-> P)')).to.equal(FALSE);
  });

  it('repeats passes until nothing changes', () => {
    // the first pass turns this into ~~P
    expect(equal(simplified('~P -> false'), P)).to.be.true;
  });

  it('leaves formulas without a matching rule alone', () => {
    const f = parseFormula('~(P & Q) | (R -> S)');
    expect(simplify(f)).to.equal(f);
  });

  it('does not apply De Morgan laws', () => {
    const f = parseFormula('~(P | Q)');
    expect(equal(simplify(f), f)).to.be.true;
  });

  describe('properties', () => {
    it('preserves meaning', () => {
      for (const source of SAMPLE_FORMULAS) {
        const f = parseFormula(source);
        expect(isEquivalent(f, simplify(f)), source).to.be.true;
      }
    });

    it('is idempotent', () => {
      for (const source of SAMPLE_FORMULAS) {
        const once = simplified(source);
        expect(equal(simplify(once), once), source).to.be.true;
      }
    });

    it('never grows the formula', () => {
      for (const source of SAMPLE_FORMULAS) {
        const f = parseFormula(source);
        expect(size(simplify(f)), source).to.be.at.most(size(f));
      }
    });
  });
});

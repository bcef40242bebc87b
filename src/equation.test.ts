import { assert, expect } from 'chai';
import { UnboundSymbolError } from './ast';
import {
  DEFAULT_MAX_VARIABLES,
  Equation,
  InvalidVariablesError,
  VariableLimitError,
  assignments,
  equalEquations,
  isContradiction,
  isForbidden,
  isTautology,
  normalize,
  renderEquation,
  toAssignment,
  toIndex,
} from './equation';
import { parseExpression } from './parse';

const norm = (lhs: string, rhs: string, vars: string[]): Equation =>
  normalize(parseExpression(lhs), parseExpression(rhs), vars);

describe('equation.ts', () => {
  describe('assignments', () => {
    it('enumerates in ascending order with the first bit most significant', () => {
      expect([...assignments(2)]).to.deep.equal([
        [0, 0],
        [0, 1],
        [1, 0],
        [1, 1],
      ]);
    });

    it('yields a single empty assignment for no variables', () => {
      expect([...assignments(0)]).to.deep.equal([[]]);
    });

    it('maps between assignments and table indices', () => {
      expect(toAssignment(6, 3)).to.deep.equal([1, 1, 0]);
      expect(toAssignment(1, 4)).to.deep.equal([0, 0, 0, 1]);
      expect(toIndex([1, 0, 1])).to.equal(5);
      expect(toIndex([])).to.equal(0);
    });
  });

  describe('normalize', () => {
    it('forbids assignments where the sides differ', () => {
      const eq = norm('x', 'y', ['x', 'y']);
      expect(eq.variables).to.deep.equal(['x', 'y']);
      expect(eq.forbidden).to.deep.equal([0, 1, 1, 0]);
    });

    it('produces a complete table', () => {
      const vars = ['x', 'y', 'z', 'v'];
      const eq = norm('y', 'vx', vars);
      expect(eq.forbidden).to.have.length(16);
      for (const f of eq.forbidden) {
        expect([0, 1]).to.include(f);
      }
    });

    it('normalizes over variables the expressions do not mention', () => {
      const eq = norm('xy', '0', ['x', 'y', 'z']);
      expect(eq.forbidden).to.deep.equal([0, 0, 0, 0, 0, 0, 1, 1]);
    });

    it('normalizes equations between constants', () => {
      expect(norm('1', '0', []).forbidden).to.deep.equal([1]);
      expect(norm('1', '1', ['x']).forbidden).to.deep.equal([0, 0]);
    });

    it('copies the variable list', () => {
      const vars = ['x', 'y'];
      const eq = norm('x', 'xy', vars);
      expect(eq.variables).to.not.equal(vars);
      expect(eq.variables).to.deep.equal(['x', 'y']);
    });

    it('throws for symbols outside the variable list', () => {
      expect(() => norm('x', 'xy', ['x'])).to.throw(UnboundSymbolError);
    });

    it('rejects repeated variables', () => {
      expect(() => norm('x', 'y', ['x', 'y', 'x'])).to.throw(
        InvalidVariablesError,
        `'x' is repeated in variables [x, y, x]`
      );
    });

    it('rejects variables that are not single letters', () => {
      expect(() => norm('x', 'y', ['x', 'yy'])).to.throw(
        InvalidVariablesError,
        `'yy' is not a symbol`
      );
    });

    it('enforces the variable limit', () => {
      expect(() =>
        normalize(parseExpression('x'), parseExpression('y'), ['x', 'y', 'z'], {
          maxVariables: 2,
        })
      ).to.throw(VariableLimitError, 'cannot normalize over 3 variables, the limit is 2');
    });

    it('defaults to a limit of sixteen variables', () => {
      expect(DEFAULT_MAX_VARIABLES).to.equal(16);
      const vars = 'abcdefghijklmnopq'.split('');
      expect(() => norm('a', 'b', vars)).to.throw(VariableLimitError);
    });
  });

  describe('renderEquation', () => {
    it('renders the forbidden constituents', () => {
      assert.equal(renderEquation(norm('x', 'xy', ['x', 'y'])), 'x(1-y) = 0');
      assert.equal(
        renderEquation(norm('x', 'y', ['x', 'y'])),
        '(1-x)y + x(1-y) = 0'
      );
      assert.equal(
        renderEquation(norm('(1-x)', 'xy', ['x', 'y'])),
        '(1-x)(1-y) + (1-x)y + xy = 0'
      );
    });

    it('renders constituents over every variable in scope', () => {
      assert.equal(
        renderEquation(norm('xz', '0', ['x', 'y', 'z'])),
        'x(1-y)z + xyz = 0'
      );
    });

    it('renders an equation forbidding nothing as 0 = 0', () => {
      assert.equal(renderEquation(norm('x', 'x', ['x', 'y'])), '0 = 0');
      assert.equal(renderEquation(norm('0', '0', [])), '0 = 0');
    });

    it('renders the unit constituent when there are no variables', () => {
      assert.equal(renderEquation(norm('1', '0', [])), '1 = 0');
    });
  });

  describe('queries', () => {
    it('looks up single assignments', () => {
      const eq = norm('x', 'xy', ['x', 'y']);
      assert.isTrue(isForbidden(eq, [1, 0]));
      assert.isFalse(isForbidden(eq, [1, 1]));
      assert.isFalse(isForbidden(eq, [0, 0]));
      expect(() => isForbidden(eq, [1])).to.throw(Error);
    });

    it('detects tautologies and contradictions', () => {
      assert.isTrue(isTautology(norm('xy', 'yx', ['x', 'y'])));
      assert.isFalse(isTautology(norm('x', 'y', ['x', 'y'])));
      assert.isTrue(isContradiction(norm('x', '(1-x)', ['x'])));
      assert.isFalse(isContradiction(norm('x', '0', ['x'])));
    });

    it('compares equations by variables and table', () => {
      const a = norm('x', 'xy', ['x', 'y']);
      assert.isTrue(equalEquations(a, norm('x(1-y)', '0', ['x', 'y'])));
      assert.isFalse(equalEquations(a, norm('y', 'xy', ['y', 'x'])));
      assert.isFalse(equalEquations(a, norm('y', 'xy', ['x', 'y'])));
    });
  });
});

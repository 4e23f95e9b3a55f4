import { describe, it, expect } from 'vitest';
import { parseDsl } from './expr';
import { StrategySyntaxError } from './errors';

function syntaxError(text: string): StrategySyntaxError {
  try {
    parseDsl(text);
  } catch (error) {
    if (error instanceof StrategySyntaxError) return error;
    throw error;
  }
  throw new Error(`expected a syntax error for: ${text}`);
}

describe('parseDsl', () => {
  describe('structure', () => {
    it('parses one comparison per section', () => {
      const tree = parseDsl('ENTRY: close > 10 EXIT: close < 5');

      expect(tree.entry).toEqual({
        kind: 'comparison',
        operator: '>',
        left: { kind: 'identifier', name: 'close' },
        right: { kind: 'number', value: 10, raw: '10', integer: true },
      });
      expect(tree.exit).toEqual({
        kind: 'comparison',
        operator: '<',
        left: { kind: 'identifier', name: 'close' },
        right: { kind: 'number', value: 5, raw: '5', integer: true },
      });
    });

    it('ignores whitespace and newlines', () => {
      const tree = parseDsl('ENTRY:\n  close\n    >\n  10\n\nEXIT:\n  FALSE\n');
      expect(tree.entry).toMatchObject({ kind: 'comparison', operator: '>' });
      expect(tree.exit).toEqual({ kind: 'constant', value: false });
    });

    it('binds AND tighter than OR', () => {
      const tree = parseDsl('ENTRY: close > 1 OR open > 2 AND volume > 3 EXIT: FALSE');

      expect(tree.entry).toMatchObject({
        kind: 'logical',
        operator: 'OR',
        operands: [
          { kind: 'comparison', left: { name: 'close' } },
          {
            kind: 'logical',
            operator: 'AND',
            operands: [
              { kind: 'comparison', left: { name: 'open' } },
              { kind: 'comparison', left: { name: 'volume' } },
            ],
          },
        ],
      });
    });

    it('lets parentheses override precedence', () => {
      const tree = parseDsl('ENTRY: (close > 1 OR open > 2) AND volume > 3 EXIT: FALSE');

      expect(tree.entry).toMatchObject({
        kind: 'logical',
        operator: 'AND',
        operands: [{ kind: 'logical', operator: 'OR' }, { kind: 'comparison' }],
      });
    });

    it('flattens chains of the same combinator', () => {
      const tree = parseDsl('ENTRY: close > 1 AND open > 2 AND volume > 3 EXIT: FALSE');
      expect(tree.entry).toMatchObject({ kind: 'logical', operator: 'AND' });
      if (tree.entry.kind !== 'logical') throw new Error('expected logical');
      expect(tree.entry.operands).toHaveLength(3);
    });

    it('gives multiplication precedence over addition inside terms', () => {
      const tree = parseDsl('ENTRY: close + open * 2 > 10 EXIT: FALSE');

      expect(tree.entry).toMatchObject({
        kind: 'comparison',
        left: {
          kind: 'arithmetic',
          operator: '+',
          left: { kind: 'identifier', name: 'close' },
          right: { kind: 'arithmetic', operator: '*' },
        },
      });
    });
  });

  describe('keywords and identifiers', () => {
    it('accepts keywords in any case and lowercases identifiers', () => {
      const tree = parseDsl('entry: Close crosses_above SMA(CLOSE, 20) and Volume > 1000 exit: false');

      expect(tree.entry).toEqual({
        kind: 'logical',
        operator: 'AND',
        operands: [
          {
            kind: 'comparison',
            operator: 'CROSSES_ABOVE',
            left: { kind: 'identifier', name: 'close' },
            right: {
              kind: 'call',
              callee: 'sma',
              args: [
                { kind: 'identifier', name: 'close' },
                { kind: 'number', value: 20, raw: '20', integer: true },
              ],
            },
          },
          {
            kind: 'comparison',
            operator: '>',
            left: { kind: 'identifier', name: 'volume' },
            right: { kind: 'number', value: 1000, raw: '1000', integer: true },
          },
        ],
      });
      expect(tree.exit).toEqual({ kind: 'constant', value: false });
    });

    it('treats TRUE and FALSE as constant conditions', () => {
      const tree = parseDsl('ENTRY: TRUE EXIT: False');
      expect(tree.entry).toEqual({ kind: 'constant', value: true });
      expect(tree.exit).toEqual({ kind: 'constant', value: false });
    });

    it('does not split identifiers that contain a keyword', () => {
      const tree = parseDsl('ENTRY: brand > 1 EXIT: FALSE');
      expect(tree.entry).toMatchObject({ left: { kind: 'identifier', name: 'brand' } });
    });

    it('leaves unknown names for the validator', () => {
      expect(() => parseDsl('ENTRY: bogus_field > 5 EXIT: macd(close, 12) > 0')).not.toThrow();
    });

    it('splits a keyword written straight after a number', () => {
      const tree = parseDsl('ENTRY: close>1AND close<2 EXIT: close<1or close>3');

      expect(tree.entry).toEqual({
        kind: 'logical',
        operator: 'AND',
        operands: [
          {
            kind: 'comparison',
            operator: '>',
            left: { kind: 'identifier', name: 'close' },
            right: { kind: 'number', value: 1, raw: '1', integer: true },
          },
          {
            kind: 'comparison',
            operator: '<',
            left: { kind: 'identifier', name: 'close' },
            right: { kind: 'number', value: 2, raw: '2', integer: true },
          },
        ],
      });
      expect(tree.exit).toMatchObject({ kind: 'logical', operator: 'OR' });
    });
  });

  describe('numeric literals', () => {
    it('distinguishes whole and fractional values', () => {
      const tree = parseDsl('ENTRY: close > 20.0 AND close > 20.5 EXIT: FALSE');

      expect(tree.entry).toMatchObject({
        operands: [
          { right: { kind: 'number', value: 20, integer: true } },
          { right: { kind: 'number', value: 20.5, integer: false } },
        ],
      });
    });

    it('folds a leading minus into the literal', () => {
      const tree = parseDsl('ENTRY: close > -5 EXIT: FALSE');
      expect(tree.entry).toMatchObject({
        right: { kind: 'number', value: -5, raw: '-5', integer: true },
      });
    });
  });

  describe('errors', () => {
    it('requires an ENTRY section', () => {
      const error = syntaxError('close > 10');
      expect(error.message).toBe('Missing ENTRY: section');
      expect(error.code).toBe('SYNTAX_ERROR');
    });

    it('requires an EXIT section', () => {
      expect(syntaxError('ENTRY: close > 10').message).toBe('Missing EXIT: section');
    });

    it('requires ENTRY before EXIT', () => {
      const error = syntaxError('EXIT: close > 1 ENTRY: close > 2');
      expect(error.message).toBe('EXIT: section at position 0 must follow the ENTRY: section');
      expect(error.position).toBe(0);
    });

    it('rejects text before the ENTRY section', () => {
      const error = syntaxError('hello ENTRY: close > 1 EXIT: FALSE');
      expect(error.message).toBe('Unexpected "h" at position 0: expected ENTRY: section');
      expect(error.token).toBe('h');
    });

    it('rejects an empty section', () => {
      const error = syntaxError('ENTRY: EXIT: close > 1');
      expect(error.message).toBe('Expected an expression after ENTRY: at position 6');
      expect(error.position).toBe(6);
    });

    it('reports the position of an unexpected token in the full text', () => {
      const error = syntaxError('ENTRY: close > 10 ) EXIT: FALSE');
      expect(error.token).toBe(')');
      expect(error.position).toBe(18);
      expect(error.message).toContain('Syntax error in ENTRY section at position 18');
      expect(error.cause).toBeInstanceOf(Error);
    });

    it('maps positions past a split keyword back onto the original text', () => {
      const error = syntaxError('ENTRY: close>1AND close<2 ) EXIT: FALSE');
      expect(error.token).toBe(')');
      expect(error.position).toBe(26);
    });

    it('rejects a bare term as a condition', () => {
      expect(syntaxError('ENTRY: close EXIT: FALSE').message).toBe(
        'Expected a comparison in ENTRY section but found "close"'
      );
    });

    it('rejects arithmetic used as a condition', () => {
      expect(syntaxError('ENTRY: close + 1 EXIT: FALSE').message).toBe(
        'Expected a comparison in ENTRY section but found operator "+"'
      );
    });

    it('rejects a comparison used as a term', () => {
      expect(syntaxError('ENTRY: TRUE EXIT: (close > 1) > 2').message).toBe(
        'Operator ">" cannot be used inside a value in EXIT section'
      );
    });

    it('rejects an indicator call without arguments', () => {
      expect(syntaxError('ENTRY: sma() > 1 EXIT: FALSE').message).toBe(
        'Indicator call sma() requires at least one argument'
      );
    });

    it('rejects string literals', () => {
      expect(syntaxError('ENTRY: close > "10" EXIT: FALSE').message).toBe(
        'Unsupported literal "10" in ENTRY section'
      );
    });
  });
});

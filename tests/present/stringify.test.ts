/**
 * Presenter Tests
 */

import {
  booleanValue,
  errorValue,
  nilValue,
  numberValue,
  stringify,
  stringValue,
  tableValue,
} from '../../src/index.js';
import { describe, expect, it } from 'vitest';

describe('stringify', () => {
  describe('scalars', () => {
    it('renders nil, booleans and numbers bare', () => {
      expect(stringify(nilValue())).toBe('nil');
      expect(stringify(booleanValue(true))).toBe('true');
      expect(stringify(booleanValue(false))).toBe('false');
      expect(stringify(numberValue(3.5))).toBe('3.5');
      expect(stringify(numberValue(-2))).toBe('-2');
    });

    it('quotes strings', () => {
      expect(stringify(stringValue('hello'))).toBe('"hello"');
    });

    it('escapes quotes and backslashes', () => {
      expect(stringify(stringValue('say "hi" \\ bye'))).toBe(
        '"say \\"hi\\" \\\\ bye"'
      );
    });

    it('renders error values with their message', () => {
      expect(stringify(errorValue('bad input'))).toBe('[error: "bad input"]');
    });
  });

  describe('tables', () => {
    it('renders one key = value line per entry', () => {
      const value = tableValue([['hi', stringValue('hello')]]);

      expect(stringify(value)).toBe('{\n  hi = "hello"\n}');
    });

    it('renders number keys as numeric text', () => {
      const value = tableValue([[1, stringValue('x')]]);

      expect(stringify(value)).toBe('{\n  1 = "x"\n}');
    });

    it('indents nested tables one unit per level', () => {
      const value = tableValue([
        ['outer', tableValue([['n', numberValue(1)]])],
      ]);

      expect(stringify(value)).toBe('{\n  outer = {\n    n = 1\n  }\n}');
    });

    it('renders empty tables as an empty block', () => {
      expect(stringify(tableValue())).toBe('{\n}');
    });

    it('starts at the given indent', () => {
      const value = tableValue([['a', numberValue(1)]]);

      expect(stringify(value, 1)).toBe('{\n    a = 1\n  }');
    });

    it('uses a custom indent unit', () => {
      const value = tableValue([['a', numberValue(1)]]);

      expect(stringify(value, 0, { indentUnit: '\t' })).toBe('{\n\ta = 1\n}');
    });

    it('shows error entries inline', () => {
      const value = tableValue([['f', errorValue('no')]]);

      expect(stringify(value)).toBe('{\n  f = [error: "no"]\n}');
    });
  });
});

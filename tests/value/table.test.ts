/**
 * Script Table Tests
 * Keyed lookup, accessors and copy-on-write updates
 */

import {
  MissingKeyError,
  numberValue,
  ScriptTable,
  stringValue,
  TableKey,
} from '../../src/index.js';
import { describe, expect, it } from 'vitest';

describe('ScriptTable', () => {
  describe('construction', () => {
    it('starts empty', () => {
      const table = new ScriptTable();

      expect(table.size).toBe(0);
      expect([...table]).toEqual([]);
    });

    it('keeps the last entry for a repeated key', () => {
      const table = new ScriptTable([
        ['a', numberValue(1)],
        [TableKey.string('a'), numberValue(2)],
      ]);

      expect(table.size).toBe(1);
      expect(table.getString('a')).toEqual(numberValue(2));
    });

    it('keeps "3" and 3 as separate entries', () => {
      const table = new ScriptTable([
        ['3', stringValue('text')],
        [3, stringValue('number')],
      ]);

      expect(table.size).toBe(2);
      expect(table.getString('3')).toEqual(stringValue('text'));
      expect(table.getNumber(3)).toEqual(stringValue('number'));
    });
  });

  describe('lookup', () => {
    const table = new ScriptTable([
      ['hi', stringValue('hello')],
      [1, numberValue(10)],
    ]);

    it('finds present keys', () => {
      expect(table.has('hi')).toBe(true);
      expect(table.find('hi')).toEqual(stringValue('hello'));
      expect(table.get(TableKey.number(1))).toEqual(numberValue(10));
    });

    it('returns undefined from find for absent keys', () => {
      expect(table.has('1')).toBe(false);
      expect(table.find('1')).toBeUndefined();
    });

    it('throws MissingKeyError from get for absent string keys', () => {
      expect(() => table.getString('missing')).toThrow(MissingKeyError);
      expect(() => table.getString('missing')).toThrow(
        'Key "missing" not found in table'
      );
    });

    it('throws MissingKeyError from get for absent number keys', () => {
      try {
        table.getNumber(2);
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(MissingKeyError);
        if (err instanceof MissingKeyError) {
          expect(err.errorId).toBe('MOON-R001');
          expect(err.key).toBe('2');
          expect(err.message).toBe('Key 2 not found in table');
        }
      }
    });

    it('maps integer keys onto number keys', () => {
      expect(table.getInteger(1)).toEqual(numberValue(10));
      expect(table.getInteger(1)).toBe(table.getNumber(1.0));
    });

    it('rejects non-integer keys in getInteger', () => {
      expect(() => table.getInteger(1.5)).toThrow(
        'Expected an integer key, got 1.5'
      );
    });
  });

  describe('updates', () => {
    it('with returns a copy holding the new entry', () => {
      const original = new ScriptTable([['a', numberValue(1)]]);
      const updated = original.with('b', numberValue(2));

      expect(updated.size).toBe(2);
      expect(updated.getString('b')).toEqual(numberValue(2));
      expect(original.size).toBe(1);
      expect(original.has('b')).toBe(false);
    });

    it('with replaces an existing entry', () => {
      const original = new ScriptTable([['a', numberValue(1)]]);

      expect(original.with('a', numberValue(5)).getString('a')).toEqual(
        numberValue(5)
      );
    });

    it('without returns a copy lacking the key', () => {
      const original = new ScriptTable([
        ['a', numberValue(1)],
        [1, numberValue(2)],
      ]);
      const updated = original.without('a');

      expect(updated.size).toBe(1);
      expect(updated.has('a')).toBe(false);
      expect(updated.has(1)).toBe(true);
      expect(original.has('a')).toBe(true);
    });
  });

  describe('iteration', () => {
    it('exposes keys and values', () => {
      const table = new ScriptTable([
        ['x', numberValue(1)],
        [2, numberValue(3)],
      ]);

      expect([...table.keys()].map((key) => key.hash())).toEqual([
        's:x',
        'n:2',
      ]);
      expect([...table.values()]).toEqual([numberValue(1), numberValue(3)]);
    });
  });
});

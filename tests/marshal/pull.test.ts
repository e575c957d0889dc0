/**
 * Pull Tests
 * Converting engine stack slots into script values
 */

import {
  booleanValue,
  errorValue,
  expectTable,
  nilValue,
  numberValue,
  pull,
  stringValue,
  tableValue,
  unsupportedTypeMessage,
  valueEquals,
} from '../../src/index.js';
import { describe, expect, it } from 'vitest';

import { createEventCollector, createLogCollector, loadScript } from '../helpers/lua.js';
import { MockOpaque, MockStack, MockTable } from '../helpers/mock-stack.js';

describe('pull', () => {
  describe('scalars', () => {
    it('converts nil, booleans, numbers and strings', () => {
      const L = loadScript('a = nil; b = true; c = 2.5; d = "text"');

      L.getGlobal('a');
      L.getGlobal('b');
      L.getGlobal('c');
      L.getGlobal('d');

      expect(pull(L, 1)).toBe(nilValue());
      expect(pull(L, 2)).toEqual(booleanValue(true));
      expect(pull(L, 3)).toEqual(numberValue(2.5));
      expect(pull(L, 4)).toEqual(stringValue('text'));
    });

    it('accepts negative indices', () => {
      const L = loadScript('n = 42');
      L.getGlobal('n');
      L.pushString('top');

      expect(pull(L, -2)).toEqual(numberValue(42));
      expect(pull(L, -1)).toEqual(stringValue('top'));
    });

    it('converts integers to numbers', () => {
      const L = loadScript('n = 7 // 2');
      L.getGlobal('n');

      expect(pull(L, -1)).toEqual(numberValue(3));
    });
  });

  describe('tables', () => {
    it('converts sequences and string keys', () => {
      const L = loadScript('t = {10, 20, name = "x"}');
      L.getGlobal('t');

      const expected = tableValue([
        [1, numberValue(10)],
        [2, numberValue(20)],
        ['name', stringValue('x')],
      ]);
      expect(valueEquals(pull(L, -1), expected)).toBe(true);
    });

    it('keeps string and number keys apart', () => {
      const L = loadScript('t = {[1] = "number", ["1"] = "text"}');
      L.getGlobal('t');

      const table = expectTable(pull(L, -1));
      expect(table.size).toBe(2);
      expect(table.getNumber(1)).toEqual(stringValue('number'));
      expect(table.getString('1')).toEqual(stringValue('text'));
    });

    it('converts nested tables', () => {
      const L = loadScript('t = {outer = {inner = {1, 2}}}');
      L.getGlobal('t');

      const outer = expectTable(expectTable(pull(L, -1)).getString('outer'));
      const inner = expectTable(outer.getString('inner'));
      expect(inner.getInteger(2)).toEqual(numberValue(2));
    });

    it('leaves the stack unchanged', () => {
      const L = loadScript('t = {a = {b = {c = 1}}, 1, 2, 3}');
      L.getGlobal('t');
      const top = L.getTop();

      pull(L, -1);

      expect(L.getTop()).toBe(top);
      expect(L.typeOf(-1)).toBe('table');
    });

    it('skips keys that are neither strings nor numbers', () => {
      const L = loadScript('t = {[true] = 1, a = 2}');
      L.getGlobal('t');
      const { logs, callbacks } = createLogCollector();

      const table = expectTable(pull(L, -1, { callbacks }));

      expect(table.size).toBe(1);
      expect(table.getString('a')).toEqual(numberValue(2));
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({
        event: 'convert:key-skipped',
        subsystem: 'pull',
        keyType: 'boolean',
      });
      expect(typeof logs[0]?.timestamp).toBe('string');
    });
  });

  describe('unsupported values', () => {
    it('converts functions to error values', () => {
      const L = loadScript('f = function() end');
      L.getGlobal('f');

      expect(pull(L, -1)).toEqual(
        errorValue(
          'Cannot convert function value: only nil, boolean, number, string and table are supported'
        )
      );
    });

    it('converts threads to error values', () => {
      const L = loadScript('co = coroutine.create(function() end)');
      L.getGlobal('co');

      expect(pull(L, -1)).toEqual(errorValue(unsupportedTypeMessage('thread')));
    });

    it('keeps unsupported entries inside tables as error values', () => {
      const L = loadScript('t = {f = print, n = 1}');
      L.getGlobal('t');

      const table = expectTable(pull(L, -1));
      expect(table.getString('f')).toEqual(
        errorValue(unsupportedTypeMessage('function'))
      );
      expect(table.getString('n')).toEqual(numberValue(1));
    });

    it('reports unsupported values to observability', () => {
      const stack = new MockStack();
      stack.pushValue(new MockOpaque('userdata'));
      const { events, callbacks } = createEventCollector();

      const value = pull(stack, -1, { observability: callbacks });

      expect(value).toEqual(errorValue(unsupportedTypeMessage('userdata')));
      expect(events.unsupported).toEqual([{ type: 'userdata' }]);
    });

    it('reports empty slots as none', () => {
      const stack = new MockStack();

      expect(pull(stack, 1)).toEqual(errorValue(unsupportedTypeMessage('none')));
    });
  });

  describe('limits', () => {
    it('stops at maxDepth with an error value', () => {
      const L = loadScript('t = {a = {b = {}}}');
      L.getGlobal('t');

      const a = expectTable(expectTable(pull(L, -1, { maxDepth: 2 })).getString('a'));

      expect(a.getString('b')).toEqual(
        errorValue('Cannot convert table: nesting exceeds maximum depth of 2')
      );
    });

    it('terminates on self-referencing tables', () => {
      const L = loadScript('t = {}; t.self = t');
      L.getGlobal('t');

      const first = expectTable(pull(L, -1, { maxDepth: 3 }));
      const second = expectTable(first.getString('self'));
      const third = expectTable(second.getString('self'));

      expect(third.getString('self')).toEqual(
        errorValue('Cannot convert table: nesting exceeds maximum depth of 3')
      );
      expect(L.getTop()).toBe(1);
    });

    it('returns an error value when the stack cannot grow', () => {
      const stack = new MockStack({ capacity: 2 });
      stack.pushValue(new MockTable([['a', 1]]));

      expect(pull(stack, -1)).toEqual(
        errorValue('Cannot convert table: engine stack exhausted')
      );
      expect(stack.getTop()).toBe(1);
    });

    it('rejects a maxDepth that is not a positive integer', () => {
      const stack = new MockStack();
      stack.pushNil();

      expect(() => pull(stack, -1, { maxDepth: 0 })).toThrow(RangeError);
    });
  });
});

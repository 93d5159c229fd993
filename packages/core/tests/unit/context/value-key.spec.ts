/**
 * @fileoverview Key Synthesis Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import {
  NamedKey,
  UnnamedKey,
  NumberType,
  StringType,
  defineType,
  isValueKey,
  keysEqual,
  synthesizeNamed,
  synthesizeUnnamed,
} from '../../../src/domain/context/index.js';

enum Channel {
  Red,
  Blue,
}

describe('Key Synthesis', () => {
  // ============================================================================
  // Unnamed Keys
  // ============================================================================

  describe('synthesizeUnnamed', () => {
    it('should return the same key for the same tag', () => {
      expect(synthesizeUnnamed(NumberType)).toBe(synthesizeUnnamed(NumberType));
    });

    it('should return distinct keys for distinct tags', () => {
      expect(synthesizeUnnamed(NumberType)).not.toBe(synthesizeUnnamed(StringType));
    });

    it('should keep tags with the same name apart', () => {
      const first = defineType<string>('Locale');
      const second = defineType<string>('Locale');

      expect(synthesizeUnnamed(first)).not.toBe(synthesizeUnnamed(second));
    });

    it('should never equal a named key of the same tag', () => {
      const unnamed = synthesizeUnnamed(NumberType);

      expect(unnamed).not.toBe(synthesizeNamed(NumberType, undefined));
      expect(keysEqual(unnamed, synthesizeNamed(NumberType, undefined))).toBe(false);
    });

    it('should expose kind and tag', () => {
      const key = synthesizeUnnamed(NumberType);

      expect(key).toBeInstanceOf(UnnamedKey);
      expect(key.kind).toBe('unnamed');
      expect(key.tag).toBe(NumberType);
    });
  });

  // ============================================================================
  // Named Keys
  // ============================================================================

  describe('synthesizeNamed', () => {
    it('should return equal keys for equal names', () => {
      expect(keysEqual(synthesizeNamed(NumberType, Channel.Red), synthesizeNamed(NumberType, Channel.Red))).toBe(
        true,
      );
      expect(keysEqual(synthesizeNamed(NumberType, 'red'), synthesizeNamed(NumberType, 'red'))).toBe(true);
    });

    it('should return unequal keys for unequal names', () => {
      expect(keysEqual(synthesizeNamed(NumberType, Channel.Red), synthesizeNamed(NumberType, Channel.Blue))).toBe(
        false,
      );
    });

    it('should return unequal keys for the same name under distinct tags', () => {
      expect(keysEqual(synthesizeNamed(NumberType, 'red'), synthesizeNamed(StringType, 'red'))).toBe(false);
    });

    it('should not match names of different primitive types', () => {
      expect(keysEqual(synthesizeNamed(NumberType, 1), synthesizeNamed(NumberType, '1'))).toBe(false);
      expect(keysEqual(synthesizeNamed(NumberType, 1), synthesizeNamed(NumberType, 1n))).toBe(false);
      expect(keysEqual(synthesizeNamed(NumberType, 0), synthesizeNamed(NumberType, false))).toBe(false);
    });

    it('should compare names with SameValueZero', () => {
      expect(keysEqual(synthesizeNamed(NumberType, NaN), synthesizeNamed(NumberType, NaN))).toBe(true);
      expect(keysEqual(synthesizeNamed(NumberType, 0), synthesizeNamed(NumberType, -0))).toBe(true);
    });

    it('should match an enum member and its runtime value', () => {
      expect(keysEqual(synthesizeNamed(NumberType, Channel.Red), synthesizeNamed(NumberType, 0))).toBe(true);
      expect(keysEqual(synthesizeNamed(NumberType, Channel.Blue), synthesizeNamed(NumberType, 1))).toBe(true);
    });

    it('should build a new key for every primitive name', () => {
      const first = synthesizeNamed(NumberType, 'req-1');
      const second = synthesizeNamed(NumberType, 'req-1');

      expect(first).not.toBe(second);
      expect(keysEqual(first, second)).toBe(true);
    });

    it('should return the same key for the same object name', () => {
      const name = { region: 'eu' };

      expect(synthesizeNamed(NumberType, name)).toBe(synthesizeNamed(NumberType, name));
      expect(keysEqual(synthesizeNamed(NumberType, name), synthesizeNamed(NumberType, { region: 'eu' }))).toBe(
        false,
      );
    });

    it('should treat each symbol as its own name', () => {
      const first = Symbol('slot');
      const second = Symbol('slot');

      expect(keysEqual(synthesizeNamed(NumberType, first), synthesizeNamed(NumberType, first))).toBe(true);
      expect(keysEqual(synthesizeNamed(NumberType, first), synthesizeNamed(NumberType, second))).toBe(false);
    });

    it('should accept null and undefined as names', () => {
      expect(keysEqual(synthesizeNamed(NumberType, null), synthesizeNamed(NumberType, null))).toBe(true);
      expect(keysEqual(synthesizeNamed(NumberType, null), synthesizeNamed(NumberType, undefined))).toBe(false);
    });

    it('should expose kind, tag and name', () => {
      const key = synthesizeNamed(StringType, Channel.Blue);

      expect(key).toBeInstanceOf(NamedKey);
      expect(key.kind).toBe('named');
      expect(key.tag).toBe(StringType);
      expect(key.name).toBe(1);
    });
  });

  // ============================================================================
  // keysEqual
  // ============================================================================

  describe('keysEqual', () => {
    it('should compare synthesized keys by kind, tag and name', () => {
      expect(keysEqual(synthesizeUnnamed(NumberType), synthesizeUnnamed(NumberType))).toBe(true);
      expect(keysEqual(synthesizeNamed(NumberType, 'a'), synthesizeNamed(NumberType, 'a'))).toBe(true);
      expect(keysEqual(synthesizeNamed(NumberType, 'a'), synthesizeNamed(NumberType, 'b'))).toBe(false);
      expect(keysEqual(synthesizeNamed(NumberType, 'a'), synthesizeNamed(StringType, 'a'))).toBe(false);
    });

    it('should match keys constructed directly', () => {
      const direct = new NamedKey(NumberType, 'red');

      expect(keysEqual(direct, synthesizeNamed(NumberType, 'red'))).toBe(true);
      expect(keysEqual(new UnnamedKey(NumberType), synthesizeUnnamed(NumberType))).toBe(true);
      expect(keysEqual(new NamedKey(NumberType, NaN), new NamedKey(NumberType, NaN))).toBe(true);
    });
  });

  // ============================================================================
  // isValueKey
  // ============================================================================

  describe('isValueKey', () => {
    it('should recognize synthesized keys', () => {
      expect(isValueKey(synthesizeUnnamed(NumberType))).toBe(true);
      expect(isValueKey(synthesizeNamed(NumberType, 'x'))).toBe(true);
    });

    it('should reject other values', () => {
      expect(isValueKey('x')).toBe(false);
      expect(isValueKey({ kind: 'unnamed', tag: NumberType })).toBe(false);
      expect(isValueKey(NumberType)).toBe(false);
    });
  });

  // ============================================================================
  // toString
  // ============================================================================

  describe('toString', () => {
    it('should describe unnamed keys by tag name', () => {
      expect(synthesizeUnnamed(NumberType).toString()).toBe('UnnamedKey(number)');
    });

    it('should describe named keys by tag name and name', () => {
      expect(synthesizeNamed(NumberType, 'red').toString()).toBe('NamedKey(number, "red")');
      expect(synthesizeNamed(NumberType, 7).toString()).toBe('NamedKey(number, 7)');
      expect(synthesizeNamed(NumberType, 7n).toString()).toBe('NamedKey(number, 7n)');
      expect(synthesizeNamed(NumberType, Symbol('slot')).toString()).toBe(
        'NamedKey(number, Symbol(slot))',
      );
      expect(synthesizeNamed(NumberType, null).toString()).toBe('NamedKey(number, null)');
      expect(synthesizeNamed(NumberType, undefined).toString()).toBe('NamedKey(number, undefined)');
      expect(synthesizeNamed(NumberType, {}).toString()).toBe('NamedKey(number, [object Object])');
    });
  });
});

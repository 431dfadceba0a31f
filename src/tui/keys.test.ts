import { describe, expect, it } from 'vitest';
import { charKey, fromTermKitKey, namedKey, parseKeySpec, typeText } from './keys.js';

describe('keys', () => {
  describe('fromTermKitKey', () => {
    it('should map named keys', () => {
      expect(fromTermKitKey('ENTER')).toEqual(namedKey('Enter'));
      expect(fromTermKitKey('SHIFT_TAB')).toEqual(namedKey('Tab', { shift: true }));
      expect(fromTermKitKey('UP')).toEqual(namedKey('Up'));
    });

    it('should map control and meta chords', () => {
      expect(fromTermKitKey('CTRL_C')).toEqual(charKey('c', { ctrl: true }));
      expect(fromTermKitKey('ALT_P')).toEqual(charKey('p', { meta: true }));
      expect(fromTermKitKey('CTRL_UNDERSCORE')).toEqual(charKey('_', { ctrl: true }));
    });

    it('should pass printable characters through', () => {
      expect(fromTermKitKey('a')).toEqual(charKey('a'));
      expect(fromTermKitKey('é')).toEqual(charKey('é'));
    });

    it('should return null for keys it does not know', () => {
      expect(fromTermKitKey('F12')).toBeNull();
    });
  });

  describe('parseKeySpec', () => {
    it('should parse modifier prefixes', () => {
      expect(parseKeySpec('C-c')).toEqual(charKey('c', { ctrl: true }));
      expect(parseKeySpec('C-C')).toEqual(charKey('c', { ctrl: true }));
      expect(parseKeySpec('S-Tab')).toEqual(namedKey('Tab', { shift: true }));
      expect(parseKeySpec('M-p')).toEqual(charKey('p', { meta: true }));
    });

    it('should parse names and aliases', () => {
      expect(parseKeySpec('Enter')).toEqual(namedKey('Enter'));
      expect(parseKeySpec('Esc')).toEqual(namedKey('Escape'));
      expect(parseKeySpec('Space')).toEqual(charKey(' '));
    });

    it('should keep the case of plain characters', () => {
      expect(parseKeySpec('A')).toEqual(charKey('A'));
      expect(parseKeySpec('-')).toEqual(charKey('-'));
    });

    it('should reject unknown keys', () => {
      expect(() => parseKeySpec('PageUp')).toThrow('Unknown key "PageUp"');
    });
  });

  it('should type one key per code point', () => {
    expect(typeText('a😀')).toEqual([charKey('a'), charKey('😀')]);
  });
});

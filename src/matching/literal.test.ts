/**
 * Literal decoder tests
 */

import { describe, it, expect } from '@jest/globals';
import { decodeLiteral, parseLiteral, LiteralSyntaxError } from './literal.js';

describe('decodeLiteral', () => {
  it('should decode single-quoted collections', () => {
    expect(decodeLiteral("[{'topic': 'Trees', 'videos': ['BST Basics', 'AVL']}]")).toEqual([
      { topic: 'Trees', videos: ['BST Basics', 'AVL'] },
    ]);
  });

  it('should accept mixed quotes and trailing commas', () => {
    expect(decodeLiteral(`{"a": 'x', 'b': ["y",],}`)).toEqual({ a: 'x', b: ['y'] });
  });

  it('should decode escapes', () => {
    expect(decodeLiteral(String.raw`'It\'s \"quoted\"\n\u00e9\x41'`)).toBe('It\'s "quoted"\né' + 'A');
  });

  it('should keep unknown escapes verbatim', () => {
    expect(decodeLiteral(String.raw`'C:\dir'`)).toBe('C:\\dir');
  });

  it('should let later duplicate keys win', () => {
    expect(decodeLiteral("{'k': 'first', 'k': 'second'}")).toEqual({ k: 'second' });
  });

  it('should decode empty collections across lines', () => {
    expect(decodeLiteral('[\n  [],\n  {}\n]')).toEqual([[], {}]);
  });

  it('should build a tagged tree', () => {
    expect(parseLiteral("['a']")).toEqual({
      kind: 'list',
      items: [{ kind: 'string', value: 'a' }],
    });
  });
});

describe('decodeLiteral rejections', () => {
  it('should reject identifiers', () => {
    expect(() => decodeLiteral("[{'topic': None}]")).toThrow(
      "Unexpected identifier 'None'; only string, list and mapping literals are allowed at position 11"
    );
  });

  it('should reject function calls', () => {
    expect(() => decodeLiteral("__import__('os')")).toThrow(LiteralSyntaxError);
  });

  it('should reject numbers', () => {
    expect(() => decodeLiteral("['a', 42]")).toThrow("Unexpected number '42'");
  });

  it('should reject attribute access after a literal', () => {
    expect(() => decodeLiteral("'abc'.upper()")).toThrow("Unexpected '.' after the literal at position 5");
  });

  it('should reject operators between literals', () => {
    expect(() => decodeLiteral("['a'] + ['b']")).toThrow(LiteralSyntaxError);
  });

  it('should reject non-string mapping keys', () => {
    expect(() => decodeLiteral("{topic: 'x'}")).toThrow(
      "Mapping keys must be string literals, found identifier 'topic'"
    );
  });

  it('should reject unterminated strings', () => {
    expect(() => decodeLiteral("['abc")).toThrow('Unterminated string literal at position 1');
  });

  it('should reject missing separators', () => {
    expect(() => decodeLiteral("['a' 'b']")).toThrow("Expected ',' or ']', found ''' at position 5");
  });

  it('should reject empty input', () => {
    expect(() => decodeLiteral('   ')).toThrow('Unexpected end of input, expected a literal');
  });

  it('should reject nesting beyond the depth limit', () => {
    expect(() => decodeLiteral('['.repeat(100) + ']'.repeat(100))).toThrow(/nested deeper/);
  });
});

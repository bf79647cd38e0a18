import { describe, it, expect } from 'vitest';
import {
  applyTransform,
  isTransformOp,
  lower,
  merge,
  textOf,
  titleCase,
  trim,
  upper,
} from '../src/main/services/transform-engine';
import { UnsupportedKindError } from '../src/shared/types';

describe('transforms', () => {
  it('changes case', () => {
    expect(upper('Hello, World')).toBe('HELLO, WORLD');
    expect(lower('Hello, World')).toBe('hello, world');
  });

  it.each([
    ['hello world', 'Hello World'],
    ['hELLO wORLD', 'Hello World'],
    ["it's o'neill", "It'S O'Neill"],
    ['hello-world', 'Hello-World'],
    ["o'neil", "O'Neil"],
    ['2nd place', '2Nd Place'],
    ['élan vital', 'Élan Vital'],
    ['  two  spaces\tand\ttabs', '  Two  Spaces\tAnd\tTabs'],
    ['', ''],
  ])('titleCase(%j) = %j', (input, expected) => {
    expect(titleCase(input)).toBe(expected);
  });

  it('trims surrounding whitespace', () => {
    expect(trim('\n  padded text \t')).toBe('padded text');
  });

  it('merges with newlines in the given order', () => {
    expect(merge(['second', 'first', 'third'])).toBe('second\nfirst\nthird');
    expect(merge(['only'])).toBe('only');
  });

  it('dispatches by operation name', () => {
    expect(applyTransform('upper', 'abc')).toBe('ABC');
    expect(applyTransform('lower', 'ABC')).toBe('abc');
    expect(applyTransform('title_case', 'abc def')).toBe('Abc Def');
    expect(applyTransform('trim', ' abc ')).toBe('abc');
  });

  it('recognizes operation names', () => {
    expect(isTransformOp('title_case')).toBe(true);
    expect(isTransformOp('reverse')).toBe(false);
    expect(isTransformOp(3)).toBe(false);
  });
});

describe('textOf', () => {
  it('returns text and the rich text fallback', () => {
    expect(textOf({ payload: { kind: 'text', text: 'plain' } })).toBe('plain');
    expect(textOf({ payload: { kind: 'rich_text', format: 'html', content: '<b>bold</b>', plainText: 'bold' } })).toBe(
      'bold',
    );
  });

  it('rejects images and file lists', () => {
    expect(() => textOf({ payload: { kind: 'image', mimeType: 'image/png', data: Buffer.from([1]) } })).toThrow(
      UnsupportedKindError,
    );
    expect(() => textOf({ payload: { kind: 'file_list', paths: ['/a'] } }, 'merge')).toThrow(
      'Cannot merge a file_list item',
    );
  });
});

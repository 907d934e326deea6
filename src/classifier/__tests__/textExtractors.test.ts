import { describe, test, expect } from 'vitest';
import {
  extractBagNumberValue,
  extractElementId,
  extractPageNumberValue,
  extractPartCountValue,
  extractPieceLengthValue,
  extractStepNumberValue,
} from '../TextExtractors';

describe('extractPageNumberValue', () => {
  test.each([
    ['6', 6],
    ['006', 6],
    [' 42 ', 42],
    ['Page 12', 12],
    ['p. 7', 7],
    ['P7', 7],
  ])('%j -> %d', (text, expected) => {
    expect(extractPageNumberValue(text)).toBe(expected);
  });

  test.each(['1234', 'six', '', '6a'])('%j is not a page number', text => {
    expect(extractPageNumberValue(text)).toBeNull();
  });
});

describe('extractStepNumberValue', () => {
  test('plain integers up to four digits', () => {
    expect(extractStepNumberValue('10')).toBe(10);
    expect(extractStepNumberValue('9999')).toBe(9999);
  });

  test('rejects zero, leading zeros and long numbers', () => {
    expect(extractStepNumberValue('0')).toBeNull();
    expect(extractStepNumberValue('010')).toBeNull();
    expect(extractStepNumberValue('12345')).toBeNull();
  });
});

describe('extractPartCountValue', () => {
  test.each([
    ['2x', 2],
    ['2 x', 2],
    ['12×', 12],
    ['3X', 3],
  ])('%j -> %d', (text, expected) => {
    expect(extractPartCountValue(text)).toBe(expected);
  });

  test('rejects a leading multiplier sign', () => {
    expect(extractPartCountValue('x2')).toBeNull();
  });
});

describe('bag numbers and piece lengths', () => {
  test('accept 1-99 only', () => {
    expect(extractBagNumberValue('7')).toBe(7);
    expect(extractBagNumberValue('99')).toBe(99);
    expect(extractBagNumberValue('100')).toBeNull();
    expect(extractBagNumberValue('0')).toBeNull();
    expect(extractPieceLengthValue('12')).toBe(12);
    expect(extractPieceLengthValue('4x')).toBeNull();
  });
});

describe('extractElementId', () => {
  test('keeps 4-8 digit ids as strings', () => {
    expect(extractElementId('3001')).toBe('3001');
    expect(extractElementId(' 6012345 ')).toBe('6012345');
    expect(extractElementId('12345678')).toBe('12345678');
  });

  test('rejects leading zeros and wrong lengths', () => {
    expect(extractElementId('0123')).toBeNull();
    expect(extractElementId('123')).toBeNull();
    expect(extractElementId('123456789')).toBeNull();
  });
});

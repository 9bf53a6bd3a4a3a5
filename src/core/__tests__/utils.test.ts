// src/core/__tests__/utils.test.ts
import { describe, it, expect } from '@jest/globals';
import { compareIds, isValidUrl } from '../utils.js';

describe('compareIds', () => {
  it('should order numeric ids by magnitude', () => {
    expect(compareIds('9', '10')).toBeLessThan(0);
    expect(compareIds('113456789012345678', '99999999999999999')).toBeGreaterThan(0);
  });

  it('should ignore leading zeros', () => {
    expect(compareIds('007', '7')).toBe(0);
    expect(compareIds('010', '9')).toBeGreaterThan(0);
  });

  it('should fall back to string order for other ids', () => {
    expect(compareIds('abc', 'abd')).toBeLessThan(0);
    expect(compareIds('b', 'a10')).toBeGreaterThan(0);
    expect(compareIds('x', 'x')).toBe(0);
  });
});

describe('isValidUrl', () => {
  it('should accept http and https only', () => {
    expect(isValidUrl('https://social.example')).toBe(true);
    expect(isValidUrl('http://localhost:3000')).toBe(true);
    expect(isValidUrl('ftp://social.example')).toBe(false);
    expect(isValidUrl('social.example')).toBe(false);
  });
});

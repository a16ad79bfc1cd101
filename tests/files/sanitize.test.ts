import { describe, it, expect } from 'vitest';
import { sanitizeFilename } from '../../src/files/sanitize.js';

describe('sanitizeFilename', () => {
  it('should replace forbidden characters and collapse the runs', () => {
    expect(sanitizeFilename('A<>B??C')).toBe('A_B_C');
  });

  it('should trim leading and trailing underscores', () => {
    expect(sanitizeFilename('<Alice>')).toBe('Alice');
  });

  it('should replace path separators and colons', () => {
    expect(sanitizeFilename('Jane/Doe: Work\\Home')).toBe('Jane_Doe_ Work_Home');
  });

  it('should collapse existing underscore runs', () => {
    expect(sanitizeFilename('a___b')).toBe('a_b');
  });

  it('should leave ordinary names alone', () => {
    expect(sanitizeFilename('Bob Smith, Alice')).toBe('Bob Smith, Alice');
  });
});

import { describe, it, expect } from 'vitest';
import { ErrorCode, getErrorTitle } from '../codes.js';

describe('ErrorCode', () => {
  it('keeps stable code values', () => {
    expect(ErrorCode.END_OF_STREAM).toBe('E100');
    expect(ErrorCode.INVALID_READ_REQUEST).toBe('E101');
    expect(ErrorCode.INSUFFICIENT_SEED_DATA).toBe('E102');
    expect(ErrorCode.INVALID_CONFIGURATION).toBe('E300');
    expect(ErrorCode.MEMORY_FILE_FAILED).toBe('E400');
  });

  it('has a title for every code', () => {
    for (const code of Object.values(ErrorCode)) {
      expect(getErrorTitle(code)).toMatch(/^[a-z ]+$/);
    }
  });

  it('maps codes to titles', () => {
    expect(getErrorTitle(ErrorCode.END_OF_STREAM)).toBe('end of stream');
    expect(getErrorTitle(ErrorCode.MEMORY_FILE_FAILED)).toBe(
      'memory file failed'
    );
  });
});

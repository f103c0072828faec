import { describe, it, expect } from 'vitest';
import {
  ContextError,
  ERROR_HINTS,
  createContextError,
  errorMessage,
  getExitCode,
  isContextError,
  wrapError,
} from '../error/context-error.js';

describe('ContextError', () => {
  it('should create error with code and message', () => {
    const error = new ContextError('CTX_TEST', 'Test error message');

    expect(error.name).toBe('ContextError');
    expect(error.code).toBe('CTX_TEST');
    expect(error.message).toBe('Test error message');
    expect(error.hint).toBeUndefined();
    expect(error.meta).toBeUndefined();
  });

  it('should attach the standard hint', () => {
    const error = createContextError('CTX_FILE_NOT_FOUND', 'missing', { file: 'README.md' });

    expect(error.hint).toBe(ERROR_HINTS.CTX_FILE_NOT_FOUND);
    expect(error.meta).toEqual({ file: 'README.md' });
  });

  it('should map configuration errors to exit code 2', () => {
    expect(getExitCode(createContextError('CTX_FILE_NOT_FOUND', 'x'))).toBe(2);
    expect(getExitCode(createContextError('CTX_PATH_ESCAPES_ROOT', 'x'))).toBe(2);
    expect(getExitCode(createContextError('CTX_INVALID_ROOT', 'x'))).toBe(2);
    expect(getExitCode(createContextError('CTX_INVALID_CONFIG', 'x'))).toBe(2);
    expect(getExitCode(createContextError('CTX_BAD_FLAGS', 'x'))).toBe(2);
  });

  it('should map other errors to exit code 1', () => {
    expect(getExitCode(createContextError('CTX_WRITE_ERROR', 'x'))).toBe(1);
    expect(getExitCode(new ContextError('UNKNOWN', 'x'))).toBe(1);
  });

  it('should wrap unknown errors', () => {
    const wrapped = wrapError(new Error('boom'), 'CTX_WRITE_ERROR');
    expect(wrapped.code).toBe('CTX_WRITE_ERROR');
    expect(wrapped.message).toBe('boom');
    expect(isContextError(wrapped)).toBe(true);

    const same = createContextError('CTX_BAD_FLAGS', 'flags');
    expect(wrapError(same)).toBe(same);
    expect(wrapError('text').message).toBe('text');
  });

  it('should extract messages from thrown values', () => {
    expect(errorMessage(new Error('m'))).toBe('m');
    expect(errorMessage(42)).toBe('42');
  });
});

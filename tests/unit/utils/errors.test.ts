/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  RoutemarkError,
  ConfigError,
  SystemError,
  ValidationError,
  MultipleValidationError,
  HookError,
  GenerationError,
  PostValidationError,
  ErrorCodes,
} from '../../../src/utils/errors.js';

describe('RoutemarkError', () => {
  it('should create error with code and message', () => {
    const error = new RoutemarkError('E001', 'Test error message');

    expect(error.code).toBe('E001');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('RoutemarkError');
  });

  it('should be instance of Error', () => {
    const error = new RoutemarkError('E001', 'Test');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(RoutemarkError);
  });

  it('should serialize to JSON', () => {
    const error = new RoutemarkError('E001', 'Test error', { key: 'value' });

    expect(error.toJSON()).toEqual({
      name: 'RoutemarkError',
      code: 'E001',
      message: 'Test error',
      details: { key: 'value' },
    });
  });
});

describe('subclasses', () => {
  it.each([
    [ConfigError, 'ConfigError'],
    [SystemError, 'SystemError'],
    [HookError, 'HookError'],
    [GenerationError, 'GenerationError'],
    [PostValidationError, 'PostValidationError'],
  ])('%o should carry its own name', (ErrorClass, name) => {
    const error = new ErrorClass('CODE', 'msg');

    expect(error.name).toBe(name);
    expect(error).toBeInstanceOf(RoutemarkError);
  });
});

describe('ValidationError', () => {
  it('should render file:line - message', () => {
    const error = new ValidationError(ErrorCodes.INVALID_PATH, 'users/handlers.ts', 12, "Route path 'users' must start with '/'");

    expect(error.message).toBe("users/handlers.ts:12 - Route path 'users' must start with '/'");
    expect(error.file).toBe('users/handlers.ts');
    expect(error.line).toBe(12);
    expect(error.reason).toBe("Route path 'users' must start with '/'");
    expect(error.code).toBe('INVALID_PATH');
  });

  it('should omit the line when unknown', () => {
    const error = new ValidationError(ErrorCodes.PARSE_ERROR, 'a.ts', 0, 'broken');

    expect(error.message).toBe('a.ts - broken');
  });
});

describe('MultipleValidationError', () => {
  it('should join messages one per line', () => {
    const error = new MultipleValidationError([
      new ValidationError(ErrorCodes.INVALID_HTTP_METHOD, 'a.ts', 3, 'bad method'),
      new ValidationError(ErrorCodes.INVALID_PATH, 'b.ts', 7, 'bad path'),
    ]);

    expect(error.code).toBe(ErrorCodes.VALIDATION_FAILED);
    expect(error.message).toBe('a.ts:3 - bad method\nb.ts:7 - bad path');
    expect(error.errors).toHaveLength(2);
    expect(error.details).toEqual({ count: 2 });
  });
});

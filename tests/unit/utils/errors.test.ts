import { describe, it, expect } from 'vitest';
import {
  SpecGenError,
  ConfigError,
  ValidationError,
  FileIOError,
  UnresolvedReferenceError,
  DependencyCycleError,
  ModelConsistencyError,
  ErrorCode,
  toSpecGenError,
} from '../../../src/utils/errors.js';

describe('Errors', () => {
  it('should create SpecGenError with correct properties', () => {
    const error = new SpecGenError(ErrorCode.GENERAL_ERROR, 'test message', { detail: 'extra' });
    expect(error.message).toBe('test message');
    expect(error.code).toBe(ErrorCode.GENERAL_ERROR);
    expect(error.details).toEqual({ detail: 'extra' });
    expect(error.name).toBe('SpecGenError');
  });

  it('should create ConfigError with correct properties', () => {
    const error = new ConfigError('config error');
    expect(error.message).toBe('config error');
    expect(error.code).toBe(ErrorCode.CONFIG_ERROR);
    expect(error.name).toBe('ConfigError');
  });

  it('should create ValidationError with correct properties', () => {
    const error = new ValidationError('validation error');
    expect(error.code).toBe(ErrorCode.VALIDATION_ERROR);
    expect(error.name).toBe('ValidationError');
  });

  it('should create FileIOError with correct properties', () => {
    const error = new FileIOError('io error');
    expect(error.code).toBe(ErrorCode.FILE_IO_ERROR);
    expect(error.name).toBe('FileIOError');
  });

  it('should name the dangling reference', () => {
    const error = new UnresolvedReferenceError('Hover', 'MarkupContent');
    expect(error.message).toBe('Unresolvable external reference: Hover depends on MarkupContent');
    expect(error.code).toBe(ErrorCode.UNRESOLVED_REFERENCE);
    expect(error.details).toEqual({ entity: 'Hover', missing: 'MarkupContent' });
    expect(error).toBeInstanceOf(SpecGenError);
  });

  it('should close the cycle in the message', () => {
    const error = new DependencyCycleError(['A', 'B']);
    expect(error.message).toBe('Dependency cycle between declarations: A -> B -> A');
    expect(error.members).toEqual(['A', 'B']);
    expect(error.code).toBe(ErrorCode.DEPENDENCY_CYCLE);
  });

  it('should carry consistency details', () => {
    const error = new ModelConsistencyError('bad property', { property: 'kind' });
    expect(error.code).toBe(ErrorCode.MODEL_CONSISTENCY_ERROR);
    expect(error.name).toBe('ModelConsistencyError');
    expect(error.details).toEqual({ property: 'kind' });
  });

  it('should format error for CLI response', () => {
    const error = new SpecGenError(ErrorCode.GENERAL_ERROR, 'test message', { detail: 'extra' });
    const response = error.toResponse('generate');
    expect(response).toEqual({
      status: 'error',
      phase: 'generate',
      error: {
        code: ErrorCode.GENERAL_ERROR,
        message: 'test message',
        details: { detail: 'extra' },
      },
    });
  });

  it('should include the cause in the CLI response', () => {
    const error = new FileIOError('io error', undefined, { cause: new Error('EACCES') });
    expect(error.toResponse('write').error).toEqual({
      code: ErrorCode.FILE_IO_ERROR,
      message: 'io error',
      cause: 'Error: EACCES',
    });
  });

  describe('toSpecGenError', () => {
    it('should pass SpecGenErrors through', () => {
      const error = new ConfigError('config error');
      expect(toSpecGenError(error)).toBe(error);
    });

    it('should wrap plain errors', () => {
      const wrapped = toSpecGenError(new TypeError('boom'));
      expect(wrapped.code).toBe(ErrorCode.GENERAL_ERROR);
      expect(wrapped.message).toBe('boom');
      expect(wrapped.cause).toBeInstanceOf(TypeError);
    });

    it('should wrap thrown non-errors', () => {
      expect(toSpecGenError('boom').message).toBe('boom');
    });
  });
});

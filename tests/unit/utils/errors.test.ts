/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  SurveyorError,
  ConfigError,
  ResolveError,
  InstallError,
  DetectorCoverageError,
  TraversalError,
  StateError,
  ErrorCodes,
  errorMessage,
} from '../../../src/utils/errors.js';

describe('SurveyorError', () => {
  it('should create error with code and message', () => {
    const error = new SurveyorError('C001', 'Test error message');

    expect(error.code).toBe('C001');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('SurveyorError');
  });

  it('should include optional details', () => {
    const details = { path: '/work/pkg', offset: 10 };
    const error = new SurveyorError('C001', 'Test error', details);

    expect(error.details).toEqual(details);
  });

  it('should be instance of Error', () => {
    const error = new SurveyorError('C001', 'Test');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(SurveyorError);
    expect(error.stack).toBeDefined();
  });

  it('should serialize to JSON', () => {
    const error = new SurveyorError('C001', 'Test error', { key: 'value' });

    expect(error.toJSON()).toEqual({
      name: 'SurveyorError',
      code: 'C001',
      message: 'Test error',
      details: { key: 'value' },
    });
  });
});

describe('error subclasses', () => {
  it('should keep the given code on a ConfigError', () => {
    const error = new ConfigError(ErrorCodes.NO_PACKAGES, 'No packages to analyze');

    expect(error.name).toBe('ConfigError');
    expect(error.code).toBe('C005');
    expect(error).toBeInstanceOf(SurveyorError);
  });

  it('should make InstallError a ResolveError with the install code', () => {
    const error = new InstallError('npm install failed', { package: 'alpha' });

    expect(error.name).toBe('InstallError');
    expect(error.code).toBe('R003');
    expect(error).toBeInstanceOf(ResolveError);
    expect(error.details).toEqual({ package: 'alpha' });
  });

  it('should fix codes for detector, traversal and state errors', () => {
    expect(new DetectorCoverageError('gap').code).toBe('D001');
    expect(new TraversalError('fault').code).toBe('T001');
    expect(new StateError('illegal').code).toBe('S001');
  });

  it('should name each subclass', () => {
    expect(new DetectorCoverageError('gap').name).toBe('DetectorCoverageError');
    expect(new TraversalError('fault').name).toBe('TraversalError');
    expect(new StateError('illegal').name).toBe('StateError');
  });
});

describe('ErrorCodes', () => {
  it('should have unique codes', () => {
    const codes = Object.values(ErrorCodes);
    expect(new Set(codes).size).toBe(codes.length);
  });
});

describe('errorMessage', () => {
  it('should return the message of an Error', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });

  it('should stringify other values', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});

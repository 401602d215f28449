/**
 * Test suite for the error taxonomy and logging
 */

import { describe, it, expect, afterEach, jest } from '@jest/globals';
import {
  AppError,
  ConflictError,
  InvalidFieldError,
  NotFoundError,
  OperationTimeoutError,
  SqlValidationError,
  ValidationError,
  toProblemDetails,
} from '../src/errors';
import { createLogger } from '../src/logger';

describe('errors', () => {
  it('renders Problem Details', () => {
    const error = new NotFoundError('Grade not found.', {
      details: "Grade with ID '7' does not exist.",
      instance: 'GradeService.getById',
    });

    expect(error.toProblemDetails()).toEqual({
      type: 'urn:problem-type:not-found',
      title: 'Not Found',
      status: 404,
      detail: 'Grade not found.',
      details: "Grade with ID '7' does not exist.",
      instance: 'GradeService.getById',
      timestamp: error.timestamp,
    });
  });

  it('names each error after its class', () => {
    expect(new ConflictError('duplicate').name).toBe('ConflictError');
    expect(new SqlValidationError('bad sql').name).toBe('SqlValidationError');
  });

  it('keeps the validation hierarchy', () => {
    const invalid = new InvalidFieldError("Field 'x' does not exist in the Grade model");

    expect(invalid).toBeInstanceOf(ValidationError);
    expect(invalid).toBeInstanceOf(AppError);
    expect(invalid.status).toBe(400);
    expect(new SqlValidationError('bad sql').status).toBe(422);
  });

  it('describes a timeout by its limit', () => {
    const error = new OperationTimeoutError(2.5, { instance: 'GradeRepository.getAll' });

    expect(error.message).toBe('Operation exceeded 2.5s');
    expect(error.status).toBe(504);
  });

  it('maps unknown errors to a server error', () => {
    expect(toProblemDetails(new Error('boom'))).toMatchObject({
      type: 'urn:problem-type:server-error',
      status: 500,
      detail: 'An unexpected error occurred',
      details: 'boom',
    });
  });
});

describe('createLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('is silent without a level', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('[TX]');

    logger.debug('a');
    logger.info('b');
    logger.error('c');

    expect(log).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });

  it('prints info but not debug at INFO', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger('[TX]', 'INFO');

    logger.debug('hidden');
    logger.info('Begin ROOT GradeService.create');

    expect(log.mock.calls).toEqual([['[TX] Begin ROOT GradeService.create']]);
  });

  it('prints errors with their message', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger('[TX]', 'DEBUG').error('GradeService.create error', new Error('boom'));

    expect(error).toHaveBeenCalledWith('[TX] GradeService.create error:', 'boom');
  });
});

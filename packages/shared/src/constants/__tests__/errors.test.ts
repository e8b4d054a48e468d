import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  getErrorMessage,
  getErrorStatusCode,
  getHttpStatusName,
  validateErrorConstants,
} from '../errors';
import { isApiErrorResponse, isValidErrorCode } from '../../types/error.types';

describe('error constants', () => {
  it('are internally consistent', () => {
    expect(validateErrorConstants()).toEqual([]);
  });

  it('map the domain error taxonomy to 404, 409 and 400', () => {
    expect(getErrorStatusCode(ErrorCode.NOT_FOUND)).toBe(404);
    expect(getErrorStatusCode(ErrorCode.CONFLICT)).toBe(409);
    expect(getErrorStatusCode(ErrorCode.BAD_REQUEST)).toBe(400);
  });

  it('reports storage not ready as 503', () => {
    expect(getErrorStatusCode(ErrorCode.CHECKPOINTER_NOT_READY)).toBe(503);
    expect(getHttpStatusName(503)).toBe('Service Unavailable');
  });

  it('uses the ownership message for missing chats', () => {
    expect(getErrorMessage(ErrorCode.CHAT_NOT_FOUND)).toBe(
      'Chat not found or you do not have permission to access it.'
    );
  });

  it('falls back to a generic status name', () => {
    expect(getHttpStatusName(418)).toBe('Error');
  });
});

describe('error type guards', () => {
  it('recognizes API error bodies', () => {
    expect(isApiErrorResponse({ error: 'Not Found', message: 'x', code: 'NOT_FOUND' })).toBe(true);
    expect(isApiErrorResponse({ error: 'Not Found', message: 'x', code: 'NOPE' })).toBe(false);
    expect(isApiErrorResponse(null)).toBe(false);
  });

  it('validates error codes', () => {
    expect(isValidErrorCode('CONFLICT')).toBe(true);
    expect(isValidErrorCode('conflict')).toBe(false);
  });
});

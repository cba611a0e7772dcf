/**
 * Unit tests for the exception hierarchy.
 */

import { describe, it, expect } from 'vitest';
import {
  EgeriaException,
  ApiException,
  ClientException,
  ConnectionException,
  InvalidParameterException,
  NotFoundException,
  UnauthorizedException,
  UnknownException,
  describeException,
  isEgeriaException,
} from '../EgeriaException.js';

describe('EgeriaException', () => {
  it('should format the catalog message and copy its actions', () => {
    const error = new InvalidParameterException('name is missing');

    expect(error).toBeInstanceOf(EgeriaException);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('InvalidParameterException');
    expect(error.message).toBe('Invalid parameters were provided -> `name is missing`.');
    expect(error.httpCode).toBe(0);
    expect(error.messageId).toBe('VALIDATION_ERROR_1');
    expect(error.context.className).toBe('InvalidParameterException');
  });

  it('should keep the caller context and cause', () => {
    const cause = new Error('boom');
    const error = new UnknownException('boom', {
      cause,
      context: { className: 'GlossaryManager', callerMethod: 'createGlossary' },
    });

    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ className: 'GlossaryManager', callerMethod: 'createGlossary' });
  });

  it('should record the endpoint on connection failures', () => {
    const error = new ConnectionException('https://localhost:9443/api/token');

    expect(error.httpCode).toBe(404);
    expect(error.additionalInfo).toEqual({
      endpoint: 'https://localhost:9443/api/token',
      errorKind: 'connection',
    });
  });

  it('should use the returned status for client errors', () => {
    const error = new ClientException('https://h/x', 409, { additionalInfo: { userId: 'erinoverview' } });

    expect(error.httpCode).toBe(409);
    expect(error.status).toBe(409);
    expect(error.additionalInfo).toEqual({ endpoint: 'https://h/x', status: 409, userId: 'erinoverview' });
    expect(error.message).toBe('Client error occurred accessing `https://h/x` with status code `409`.');
  });

  it('should report 404 for missing URLs', () => {
    expect(new NotFoundException('https://h/y').httpCode).toBe(404);
  });

  it('should name the user on authorization failures', () => {
    const error = new UnauthorizedException('peterprofile');
    expect(error.message).toBe('User not authorized received for user - `peterprofile`.');
    expect(error.httpCode).toBe(401);
  });

  describe('ApiException.fromResponseBody', () => {
    it('should read the platform envelope', () => {
      const error = ApiException.fromResponseBody({
        relatedHTTPCode: 400,
        exceptionErrorMessageId: 'OMAG-COMMON-400-018',
        exceptionErrorMessage: 'The unique name is already in use',
        exceptionUserAction: 'Choose another name',
        extra: 42,
      });

      expect(error.httpCode).toBe(400);
      expect(error.message).toBe('Egeria detected error: `The unique name is already in use`.');
      expect(error.platformError).toEqual({
        relatedHTTPCode: 400,
        exceptionClassName: undefined,
        exceptionErrorMessage: 'The unique name is already in use',
        exceptionErrorMessageId: 'OMAG-COMMON-400-018',
        exceptionSystemAction: undefined,
        exceptionUserAction: 'Choose another name',
      });
    });

    it('should ignore fields with unexpected types', () => {
      const error = ApiException.fromResponseBody({ relatedHTTPCode: '400' });
      expect(error.httpCode).toBe(500);
      expect(error.message).toBe('Egeria detected error: `no message returned`.');
    });
  });

  describe('describeException', () => {
    it('should prefer the platform fields for API errors', () => {
      const error = ApiException.fromResponseBody(
        {
          relatedHTTPCode: 404,
          exceptionErrorMessageId: 'OMAG-REPOSITORY-HANDLER-404-001',
          exceptionErrorMessage: 'No element',
          exceptionUserAction: 'Check the GUID',
        },
        {
          context: { callerMethod: 'getTermByGuid' },
          additionalInfo: { endpoint: 'https://h/terms/1/retrieve' },
        }
      );

      expect(describeException(error)).toEqual([
        ['Exception', 'ApiException'],
        ['HTTP Code', '404'],
        ['Egeria Code', 'OMAG-REPOSITORY-HANDLER-404-001'],
        ['Caller Method', 'getTermByGuid'],
        ['Request URL', 'https://h/terms/1/retrieve'],
        ['Egeria Message', 'No element'],
        ['Egeria User Action', 'Check the GUID'],
      ]);
    });

    it('should fall back to the catalog entry', () => {
      const rows = describeException(new InvalidParameterException('bad'));
      expect(rows[2]).toEqual(['Egeria Code', 'VALIDATION_ERROR_1']);
      expect(rows[3]).toEqual(['Caller Method', '---']);
      expect(rows[4]).toEqual(['Request URL', '---']);
    });
  });

  it('should recognise SDK exceptions only', () => {
    expect(isEgeriaException(new UnknownException('x'))).toBe(true);
    expect(isEgeriaException(new Error('x'))).toBe(false);
  });
});

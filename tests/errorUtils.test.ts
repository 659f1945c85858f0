/**
 * Tests for error utilities and the planner error taxonomy
 */
import { extractErrorMessage } from '../logic/utils/errorUtils';
import { AuthError, ConnectivityError, PublishError, UpstreamError, toPlannerError } from '../logic/plannerApi/errors';

describe('extractErrorMessage', () => {
  test('reads the message of an Error', () => {
    expect(extractErrorMessage(new Error('boom'))).toBe('boom');
  });

  test('returns strings as they are', () => {
    expect(extractErrorMessage('plain failure')).toBe('plain failure');
  });

  test('reads a message property of plain objects', () => {
    expect(extractErrorMessage({ message: 'from object' })).toBe('from object');
  });

  test('stringifies anything else', () => {
    expect(extractErrorMessage(42)).toBe('42');
  });
});

describe('toPlannerError', () => {
  test('keeps planner errors', () => {
    const error = new AuthError('denied', 401);

    expect(toPlannerError(error)).toBe(error);
  });

  test('wraps other values as upstream errors', () => {
    const wrapped = toPlannerError(new Error('boom'));

    expect(wrapped).toBeInstanceOf(UpstreamError);
    expect(wrapped.message).toBe('Unexpected error: boom');
  });

  test('error classes carry their names and kinds', () => {
    const error = new ConnectivityError('offline');

    expect(error.name).toBe('ConnectivityError');
    expect(error.kind).toBe('connectivity');
    expect(error).toBeInstanceOf(Error);
  });

  test('sensor update failures have their own kind', () => {
    expect(new PublishError('Failed to update battery plan sensors: offline').kind).toBe('publish');
  });
});

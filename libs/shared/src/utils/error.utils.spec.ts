import { getErrorMessage, getErrorStack } from './error.utils';

describe('error utils', () => {
  it('should read the message of an Error', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
  });

  it('should pass strings through', () => {
    expect(getErrorMessage('plain failure')).toBe('plain failure');
  });

  it('should serialize other thrown values', () => {
    expect(getErrorMessage({ code: 42 })).toBe('{"code":42}');
    expect(getErrorMessage(undefined)).toBe('undefined');
  });

  it('should only return stacks for Error instances', () => {
    expect(getErrorStack(new Error('boom'))).toContain('boom');
    expect(getErrorStack('boom')).toBeUndefined();
  });
});

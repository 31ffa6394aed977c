import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { logError, redactSensitiveData } from '../logger';

function parseLine(line: unknown): { message: string; context: unknown } {
  const match = /^\[[^\]]+\] ERROR (.+?) (\{.*\})$/.exec(String(line));
  if (!match) throw new Error(`unexpected log line: ${String(line)}`);
  return { message: match[1], context: JSON.parse(match[2]) };
}

describe('logError', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('logs an Error under its own message with name and stack', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    logError(new Error('listen EADDRINUSE'), { source: 'startup' });

    expect(spy).toHaveBeenCalledTimes(1);
    const { message, context } = parseLine(spy.mock.calls[0][0]);
    expect(message).toBe('listen EADDRINUSE');
    expect(context).toMatchObject({
      source: 'startup',
      error: { name: 'Error', message: 'listen EADDRINUSE' },
    });
  });

  it('logs a non-Error value as an unknown error', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    logError('socket closed', { source: 'uncaughtException' });

    const { message, context } = parseLine(spy.mock.calls[0][0]);
    expect(message).toBe('Unknown error');
    expect(context).toEqual({ source: 'uncaughtException', error: 'socket closed' });
  });
});

describe('redactSensitiveData', () => {
  it('masks sensitive keys at any depth', () => {
    expect(redactSensitiveData({ smtp: { password: 'test-secret', host: 'localhost' }, authorization: 'x' })).toEqual({
      smtp: { password: '[REDACTED]', host: 'localhost' },
      authorization: '[REDACTED]',
    });
  });
});

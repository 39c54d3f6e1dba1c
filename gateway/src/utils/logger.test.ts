import { afterEach, describe, expect, it, vi } from 'vitest';
import { Logger } from './logger';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write one JSON line per info event', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(Date, 'now').mockReturnValue(1700000000000);

    new Logger('test').info('UPSTREAM_RESPONSE', { status: 200 });

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
      timestamp: 1700000000000,
      level: 'info',
      service: 'test',
      event: 'UPSTREAM_RESPONSE',
      data: { status: 200 },
    });
  });

  it('should write errors to stderr with the error message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(Date, 'now').mockReturnValue(1700000000000);

    new Logger('test').error('FORWARD_FAILED', new Error('socket hang up'));

    expect(JSON.parse(String(error.mock.calls[0][0]))).toEqual({
      timestamp: 1700000000000,
      level: 'error',
      service: 'test',
      event: 'FORWARD_FAILED',
      error: 'socket hang up',
    });
  });

  it('should default the service name', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new Logger().warn('CREDENTIALS_NOT_CONFIGURED');

    expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({ level: 'warn', service: 'gateway' });
  });
});

/**
 * Unit tests for the logger
 */

import { formatLog, createLogger } from './logger';

describe('Logger', () => {
  const now = new Date('2026-03-01T10:00:00.000Z');

  describe('formatLog', () => {
    it('should prefix timestamp and level', () => {
      expect(formatLog('INFO', 'hello', undefined, now)).toBe('[2026-03-01T10:00:00.000Z] [INFO] hello');
    });

    it('should include service, action and a shortened request id', () => {
      const line = formatLog('WARN', 'slow', {
        service: 'API',
        action: 'analyze',
        request_id: '0123456789abcdef',
      }, now);

      expect(line).toBe('[2026-03-01T10:00:00.000Z] [WARN] [API] [analyze] [req:01234567] slow');
    });

    it('should append extra fields as JSON', () => {
      const line = formatLog('INFO', 'done', { service: 'API', width: 640, skipped: undefined }, now);

      expect(line).toBe('[2026-03-01T10:00:00.000Z] [INFO] [API] done {"width":640}');
    });
  });

  describe('createLogger', () => {
    let logSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;
    const originalDebug = process.env.DEBUG;

    beforeEach(() => {
      logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
      logSpy.mockRestore();
      errorSpy.mockRestore();
      if (originalDebug === undefined) {
        delete process.env.DEBUG;
      } else {
        process.env.DEBUG = originalDebug;
      }
    });

    it('should tag lines with the service name', () => {
      createLogger('SERVER').error('boom');

      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy.mock.calls[0][0]).toMatch(/\[ERROR\] \[SERVER\] boom$/);
    });

    it('should drop debug lines unless DEBUG is set', () => {
      delete process.env.DEBUG;
      createLogger('SERVER').debug('hidden');
      expect(logSpy).not.toHaveBeenCalled();

      process.env.DEBUG = '1';
      createLogger('SERVER').debug('shown');
      expect(logSpy).toHaveBeenCalledTimes(1);
    });
  });
});

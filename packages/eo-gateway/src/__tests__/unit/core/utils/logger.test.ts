import { describe, it, expect, vi } from 'vitest';
import { ConsoleLogger, createLogger } from '../../../../core/utils/logger.js';

describe('ConsoleLogger', () => {
  it('should write JSON lines when not pretty', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: 'info', service: 'eo-gateway:test', pretty: false, context: {} });

    logger.info('Listing complete', { keys: 4 });

    expect(JSON.parse(String(info.mock.calls[0][0]))).toEqual({
      timestamp: expect.any(String),
      level: 'info',
      service: 'eo-gateway:test',
      message: 'Listing complete',
      keys: 4,
    });
  });

  it('should render pretty lines with child context', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: 'debug', service: 'eo-gateway:test', pretty: true, context: {} });

    logger.child({ provider: 'aws' }).warn('Provider failed');

    expect(String(warn.mock.calls[0][0])).toMatch(
      /^\[\S+\] WARN eo-gateway:test: Provider failed \{"provider":"aws"\}$/
    );
  });

  it('should drop entries below its level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: 'info', service: 's', pretty: true, context: {} });

    logger.debug('hidden');

    expect(debug).not.toHaveBeenCalled();
  });
});

describe('createLogger', () => {
  it('should follow LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = createLogger({ module: 'buckets' });
    logger.info('hidden');
    logger.warn('shown');

    expect(info).not.toHaveBeenCalled();
    expect(String(warn.mock.calls[0][0])).toContain('eo-gateway:buckets: shown');
    vi.unstubAllEnvs();
  });
});

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('formats level, message and metadata', () => {
    const line = new Logger().format('warn', 'Something happened', { path: 'a.org' });
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN\] Something happened \{"path":"a.org"\}$/);
  });

  it('serializes errors by name and message', () => {
    const line = new Logger().format('error', 'Failed', new TypeError('bad'));
    expect(line.endsWith('[ERROR] Failed {"name":"TypeError","message":"bad"}')).toBe(true);
  });

  it('writes to stderr at or above the configured level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = new Logger();
    log.setLevel('warn');

    log.info('hidden');
    log.warn('shown');
    log.error('also shown');

    expect(log.getLevel()).toBe('warn');
    expect(spy).toHaveBeenCalledTimes(2);
    expect(String(spy.mock.calls[0]?.[0])).toContain('[WARN] shown');
  });
});

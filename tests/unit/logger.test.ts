import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger } from '@/lib/logger';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write scoped lines with JSON context', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    createLogger('payroll', 'info').info('Report generated', { entityId: 'job-1' });

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0][0]).toMatch(/^\[\S+\] \[INFO\] \[payroll\] Report generated \{"entityId":"job-1"\}$/);
  });

  it('should drop messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    createLogger('payroll', 'info').debug('noisy');

    expect(debug).not.toHaveBeenCalled();
  });

  it('should nest child scopes', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    createLogger('work-tracking', 'debug').child('store').warn('slow query');

    expect(warn.mock.calls[0][0]).toContain('[WARN] [work-tracking:store] slow query');
  });

  it('should print the stack for errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('connection reset');

    createLogger('payroll', 'info').error('Pay calculation failed', { error: failure });

    expect(error).toHaveBeenCalledTimes(2);
    expect(error.mock.calls[0][0]).toContain('{"error":{"name":"Error","message":"connection reset"}}');
    expect(error.mock.calls[1][0]).toBe(failure.stack);
  });
});

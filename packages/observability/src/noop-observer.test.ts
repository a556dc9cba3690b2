import { vi } from 'vitest';
import { NoopObserver } from './noop-observer.js';

describe('NoopObserver', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes nothing to the console', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const observer = new NoopObserver();

    observer.onConnection({ type: 'timeout', host: 'h', port: 1883, timestamp: new Date() });
    observer.onOversizedMessage({ sessionId: 's', topic: 't', size: 10, threshold: 1 });
    observer.onError(new Error('ignored'), {});

    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });

  it('flush resolves', async () => {
    await expect(new NoopObserver().flush()).resolves.toBeUndefined();
  });
});

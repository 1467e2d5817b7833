import { describe, it, expect } from 'vitest';
import {
  attempt,
  ConnectionError,
  DiscoveryError,
  ProtocolError,
  toConnectorError,
  withTimeout,
} from './errors.js';

describe('toConnectorError', () => {
  it('wraps plain errors in the requested kind', () => {
    const cause = new Error('adapter off');
    const error = toConnectorError('discovery', cause);

    expect(error).toBeInstanceOf(DiscoveryError);
    expect(error.kind).toBe('discovery');
    expect(error.message).toBe('adapter off');
    expect(error.name).toBe('DiscoveryError');
    expect(error.cause).toBe(cause);
  });

  it('passes connector errors through unchanged', () => {
    const original = new ProtocolError('bad frame');
    expect(toConnectorError('connection', original)).toBe(original);
  });

  it('stringifies non-error values', () => {
    expect(toConnectorError('connection', 'refused').message).toBe('refused');
  });
});

describe('attempt', () => {
  it('captures the value', async () => {
    expect(await attempt('connection', async () => 7)).toEqual({ ok: true, value: 7 });
  });

  it('captures synchronous and asynchronous throws', async () => {
    const sync = await attempt('connection', () => {
      throw new Error('sync');
    });
    const failedAsync = await attempt('connection', async () => {
      throw new Error('async');
    });

    expect(sync.ok).toBe(false);
    expect(failedAsync.ok).toBe(false);
    if (!failedAsync.ok) expect(failedAsync.error).toBeInstanceOf(ConnectionError);
  });
});

describe('withTimeout', () => {
  it('resolves when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50, 'Connect')).resolves.toBe('ok');
  });

  it('rejects with a ConnectionError after the deadline', async () => {
    const never = new Promise<never>(() => {});
    await expect(withTimeout(never, 10, 'Connect to AA')).rejects.toThrow('Connect to AA timed out after 10ms');
    await expect(withTimeout(never, 10, 'Connect to AA')).rejects.toBeInstanceOf(ConnectionError);
  });
});

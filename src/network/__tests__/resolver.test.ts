import { describe, it, expect } from 'vitest';
import { resolveHost, lookupIPv4 } from '../resolver.js';
import { ResolutionError } from '../../utils/errors.js';
import { connectionError } from '../../scanner/__tests__/fakes.js';

describe('resolveHost', () => {
  it('returns the address from the lookup', async () => {
    const looked: string[] = [];
    const address = await resolveHost(' scanme.test ', async (host) => {
      looked.push(host);
      return '192.0.2.10';
    });

    expect(address).toBe('192.0.2.10');
    expect(looked).toEqual(['scanme.test']);
  });

  it('wraps lookup failures in a ResolutionError', async () => {
    const failure = resolveHost('nowhere.invalid', async () => {
      throw connectionError('ENOTFOUND', 'getaddrinfo ENOTFOUND nowhere.invalid');
    });

    await expect(failure).rejects.toBeInstanceOf(ResolutionError);
    await expect(failure).rejects.toMatchObject({
      message: 'Unable to resolve nowhere.invalid',
      code: 'RESOLUTION_ERROR',
      host: 'nowhere.invalid',
      metadata: { host: 'nowhere.invalid', cause: 'ENOTFOUND' },
    });
  });

  it('rejects an empty host without a lookup', async () => {
    let called = false;
    const failure = resolveHost('   ', async () => {
      called = true;
      return '127.0.0.1';
    });

    await expect(failure).rejects.toBeInstanceOf(ResolutionError);
    expect(called).toBe(false);
  });

  it('passes IPv4 literals through the system resolver unchanged', async () => {
    await expect(lookupIPv4('127.0.0.1')).resolves.toBe('127.0.0.1');
  });
});

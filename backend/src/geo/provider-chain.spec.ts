import { PlaceProvider } from './geo.types';
import { ProviderTimeoutError, orderProviders, runProviderChain } from './provider-chain';

const named = (name: string) => ({ name });

describe('runProviderChain', () => {
  it('stops at the first accepted result', async () => {
    const attempt = jest.fn(async (provider: { name: string }) => [provider.name]);

    const result = await runProviderChain({
      providers: [named('primary'), named('secondary')],
      timeoutMs: 1000,
      attempt,
      accept: (value) => value.length > 0,
    });

    expect(result.winner).toEqual({ provider: 'primary', value: ['primary'] });
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('records failures and moves on', async () => {
    const onFailure = jest.fn();

    const result = await runProviderChain({
      providers: [named('primary'), named('secondary')],
      timeoutMs: 1000,
      attempt: async (provider) => {
        if (provider.name === 'primary') {
          throw new Error('HTTP 503');
        }
        return ['place'];
      },
      accept: (value) => value.length > 0,
      onFailure,
    });

    expect(result.winner?.provider).toBe('secondary');
    expect(result.failures).toEqual([{ provider: 'primary', reason: 'HTTP 503' }]);
    expect(onFailure).toHaveBeenCalledWith({ provider: 'primary', reason: 'HTTP 503' });
  });

  it('treats declined results as no failure', async () => {
    const result = await runProviderChain({
      providers: [named('primary'), named('secondary')],
      timeoutMs: 1000,
      attempt: async (): Promise<string[]> => [],
      accept: (value) => value.length > 0,
    });

    expect(result.winner).toBeNull();
    expect(result.failures).toEqual([]);
    expect(result.declined).toEqual(['primary', 'secondary']);
  });

  it('aborts an attempt that exceeds its deadline', async () => {
    let observedSignal: AbortSignal | undefined;

    const result = await runProviderChain({
      providers: [named('slow'), named('fast')],
      timeoutMs: 20,
      attempt: (provider, signal) => {
        if (provider.name === 'slow') {
          observedSignal = signal;
          return new Promise<string[]>(() => undefined);
        }
        return Promise.resolve(['place']);
      },
      accept: (value) => value.length > 0,
    });

    expect(result.winner?.provider).toBe('fast');
    expect(result.failures).toEqual([
      { provider: 'slow', reason: new ProviderTimeoutError('slow', 20).message },
    ]);
    expect(observedSignal?.aborted).toBe(true);
  });
});

describe('orderProviders', () => {
  const provider = (name: string, enabled: boolean, geocodes: boolean): PlaceProvider => ({
    name,
    isEnabled: () => enabled,
    ...(geocodes ? { geocode: async () => null } : { searchNearby: async () => [] }),
  });

  it('follows the configured order and skips disabled or incapable providers', () => {
    const providers = [
      provider('mapmyindia', false, true),
      provider('google', true, false),
      provider('nominatim', true, true),
    ];

    const ordered = orderProviders(providers, ['google', 'nominatim', 'mapmyindia', 'unknown'], 'geocode');

    expect(ordered.map((item) => item.name)).toEqual(['nominatim']);
  });
});

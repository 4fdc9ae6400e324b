import axios from 'axios';

import { ProviderAttemptFailure } from '../common/errors/concierge.errors';
import { PlaceProvider } from './geo.types';

export type ProviderCapability = 'geocode' | 'nearby';

export class ProviderTimeoutError extends Error {
  constructor(provider: string, timeoutMs: number) {
    super(`${provider} did not answer within ${timeoutMs}ms`);
    this.name = 'ProviderTimeoutError';
  }
}

export interface ProviderChainOptions<P extends { name: string }, T> {
  providers: readonly P[];
  timeoutMs: number;
  attempt: (provider: P, signal: AbortSignal) => Promise<T>;
  /** Results rejected here advance the chain without counting as a failure. */
  accept: (value: T) => boolean;
  onFailure?: (failure: ProviderAttemptFailure) => void;
}

export interface ProviderChainResult<T> {
  winner: { provider: string; value: T } | null;
  failures: ProviderAttemptFailure[];
  /** Providers that answered but whose result was not accepted. */
  declined: string[];
}

/**
 * Tries providers strictly in order and stops at the first accepted result.
 * Each attempt gets its own deadline; the abort signal is raised when it
 * expires so the underlying request is cancelled too.
 */
export async function runProviderChain<P extends { name: string }, T>(
  options: ProviderChainOptions<P, T>,
): Promise<ProviderChainResult<T>> {
  const failures: ProviderAttemptFailure[] = [];
  const declined: string[] = [];

  for (const provider of options.providers) {
    try {
      const value = await withDeadline(
        (signal) => options.attempt(provider, signal),
        options.timeoutMs,
        provider.name,
      );

      if (options.accept(value)) {
        return { winner: { provider: provider.name, value }, failures, declined };
      }
      declined.push(provider.name);
    } catch (error) {
      const failure = { provider: provider.name, reason: describeProviderError(error) };
      failures.push(failure);
      options.onFailure?.(failure);
    }
  }

  return { winner: null, failures, declined };
}

async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ProviderTimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

export function describeProviderError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.response ? `HTTP ${error.response.status}` : error.code ?? error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Orders the enabled providers offering a capability by the configured names.
 * Unknown names are skipped.
 */
export function orderProviders(
  providers: readonly PlaceProvider[],
  order: readonly string[],
  capability: ProviderCapability,
): PlaceProvider[] {
  return order.flatMap((name) => {
    const provider = providers.find((candidate) => candidate.name === name);
    if (!provider || !provider.isEnabled()) {
      return [];
    }
    const supported =
      capability === 'geocode'
        ? provider.geocode !== undefined
        : provider.searchNearby !== undefined;
    return supported ? [provider] : [];
  });
}

import { ConfigService } from '@nestjs/config';

import { PersistenceDriver } from './env.validation';

export function readNumber(config: ConfigService, key: string, fallback: number): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === null || raw === '') {
    return fallback;
  }

  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function readList(config: ConfigService, key: string, fallback: string[]): string[] {
  const raw = config.get<string>(key);
  if (!raw?.trim()) {
    return fallback;
  }

  return raw
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

export function resolvePersistenceDriver(config: ConfigService): PersistenceDriver {
  const explicit = config.get<string>('PERSISTENCE_DRIVER');
  if (explicit === 'postgres' || explicit === 'memory') {
    return explicit;
  }

  return config.get<string>('DATABASE_URL') ? 'postgres' : 'memory';
}

import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const PERSISTENCE_DRIVERS = ['postgres', 'memory'] as const;
export type PersistenceDriver = (typeof PERSISTENCE_DRIVERS)[number];

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  PORT?: number;

  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @IsString()
  CORS_ORIGINS?: string;

  @IsOptional()
  @IsIn(PERSISTENCE_DRIVERS)
  PERSISTENCE_DRIVER?: PersistenceDriver;

  @IsOptional()
  @IsString()
  DATABASE_URL?: string;

  @IsOptional()
  @IsInt()
  @Min(100)
  DATABASE_QUERY_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  DATABASE_POOL_SIZE?: number;

  @IsOptional()
  @IsString()
  WEBHOOK_SECRET?: string;

  @IsOptional()
  @IsString()
  MAPMYINDIA_CLIENT_ID?: string;

  @IsOptional()
  @IsString()
  MAPMYINDIA_CLIENT_SECRET?: string;

  @IsOptional()
  @IsString()
  GOOGLE_PLACES_API_KEY?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  NOMINATIM_BASE_URL?: string;

  @IsOptional()
  @IsString()
  NOMINATIM_USER_AGENT?: string;

  @IsOptional()
  @IsString()
  GEOCODE_PROVIDER_ORDER?: string;

  @IsOptional()
  @IsString()
  NEARBY_PROVIDER_ORDER?: string;

  @IsOptional()
  @IsInt()
  @Min(100)
  PROVIDER_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  RECOMMENDATION_CACHE_TTL_SECONDS?: number;

  @IsOptional()
  @IsInt()
  @Min(100)
  RECOMMENDATION_RADIUS_METERS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(60)
  MAX_RECOMMENDATIONS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(6)
  RECOMMENDATION_LOCATION_PRECISION?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  SESSION_STALE_AFTER_HOURS?: number;
}

export function validateEnvironment(config: Record<string, unknown>): Record<string, unknown> {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return config;
}

import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

const toBoolean = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim().toLowerCase() === 'true' : value;

export class EnvironmentVariables {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  PORT: number = 3000;

  @IsIn(['postgres', 'memory'])
  STORAGE_DRIVER: 'postgres' | 'memory' = 'postgres';

  @IsOptional()
  @IsString()
  DATABASE_URL?: string;

  @Transform(toBoolean)
  @IsBoolean()
  DATABASE_SYNCHRONIZE: boolean = false;

  @IsIn(['redis', 'memory'])
  CACHE_DRIVER: 'redis' | 'memory' = 'redis';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  CACHE_TTL_SECONDS: number = 300;

  @IsOptional()
  @IsString()
  REDIS_URL?: string;

  @IsOptional()
  @IsString()
  REDIS_HOST?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  REDIS_PORT?: number;

  @IsOptional()
  @IsString()
  REDIS_PASSWORD?: string;

  @IsOptional()
  @IsString()
  GEMINI_API_KEY?: string;

  @IsString()
  GEMINI_MODEL: string = 'gemini-2.5-flash';

  @IsUrl({ require_tld: false })
  LIVE_SOURCE_BASE_URL: string = 'https://www.linkedin.com';

  @IsOptional()
  @IsString()
  SCRAPER_API_KEY?: string;

  @Type(() => Number)
  @IsInt()
  @Min(100)
  @Max(300_000)
  LIVE_ACQUISITION_TIMEOUT_MS: number = 30_000;

  @Type(() => Number)
  @IsInt()
  @Min(100)
  ACQUISITION_LOCK_WAIT_MS: number = 60_000;

  @Transform(toBoolean)
  @IsBoolean()
  ALLOW_SYNTHETIC_FOR_UNKNOWN: boolean = true;

  @Transform(toBoolean)
  @IsBoolean()
  REFRESH_ENABLED: boolean = true;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  REFRESH_STALE_AFTER_HOURS: number = 24;
}

export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    exposeDefaultValues: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return validated;
}

/**
 * Reads a module-selection flag before ConfigService exists (dynamic module
 * wiring happens while the import graph is being built).
 */
export function readDriver<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
  const raw = process.env[name];
  return allowed.find((candidate) => candidate === raw) ?? fallback;
}

export function readFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  return raw === undefined || raw === '' ? fallback : raw === 'true';
}

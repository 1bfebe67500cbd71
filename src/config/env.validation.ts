import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export enum SessionBackend {
  MEMORY = 'memory',
  REDIS = 'redis',
}

export enum AuditSinkKind {
  NONE = 'none',
  SHEETS = 'sheets',
  PG = 'pg',
}

export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  BOT_TOKEN!: string;

  @IsString()
  @IsNotEmpty()
  OPENAI_API_KEY!: string;

  @IsOptional()
  @IsString()
  OPENAI_MODEL?: string;

  @IsOptional()
  @IsString()
  OPENAI_BASE_URL?: string;

  @IsInt()
  @Min(1000)
  GENERATION_TIMEOUT_MS: number = 60_000;

  @IsInt()
  @Min(1)
  @Max(10)
  GENERATION_MAX_ATTEMPTS: number = 1;

  @IsInt()
  @Min(0)
  GENERATION_RETRY_BASE_MS: number = 800;

  @IsInt()
  @Min(0)
  GENERATION_RETRY_MAX_MS: number = 10_000;

  @IsInt()
  @Min(1)
  MAX_DESCRIPTION_LENGTH: number = 2000;

  @IsInt()
  @Min(0)
  MAX_CLARIFICATIONS: number = 3;

  @IsOptional()
  @IsEnum(SessionBackend)
  SESSION_BACKEND?: SessionBackend;

  @IsOptional()
  @IsString()
  REDIS_URL?: string;

  @IsInt()
  @Min(60)
  SESSION_TTL_SECONDS: number = 86_400;

  @IsString()
  DRAFT_CACHE_DIR: string = 'cache';

  @IsBoolean()
  DRAFT_CACHE_ENABLED: boolean = true;

  @IsOptional()
  @IsString()
  EXPORT_DIR?: string;

  @IsEnum(AuditSinkKind)
  AUDIT_SINK: AuditSinkKind = AuditSinkKind.NONE;

  @IsOptional()
  @IsString()
  GOOGLE_CREDS_JSON?: string;

  @IsOptional()
  @IsString()
  AUDIT_SPREADSHEET_ID?: string;

  @IsString()
  AUDIT_SHEET_RANGE: string = 'Sheet1!A1';

  @IsOptional()
  @IsString()
  PG_HOST?: string;

  @IsOptional()
  @IsInt()
  PG_PORT?: number;

  @IsOptional()
  @IsString()
  PG_DB?: string;

  @IsOptional()
  @IsString()
  PG_USER?: string;

  @IsOptional()
  @IsString()
  PG_PASS?: string;

  @IsInt()
  @Min(1)
  PG_POOL_MAX: number = 5;

  @IsOptional()
  @IsString()
  LOKI_HOST?: string;
}

const BOOLEAN_KEYS = ['DRAFT_CACHE_ENABLED'];

/**
 * Validates process env at startup. Numeric strings are converted by
 * class-transformer; booleans accept "true"/"false"/"1"/"0".
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const normalized: Record<string, unknown> = { ...config };
  for (const key of BOOLEAN_KEYS) {
    const raw = normalized[key];
    if (typeof raw === 'string') {
      normalized[key] = raw === 'true' || raw === '1';
    }
  }

  const validatedConfig = plainToInstance(EnvironmentVariables, normalized, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  if (
    validatedConfig.AUDIT_SINK === AuditSinkKind.SHEETS &&
    (!validatedConfig.GOOGLE_CREDS_JSON || !validatedConfig.AUDIT_SPREADSHEET_ID)
  ) {
    throw new Error(
      'Invalid environment configuration: AUDIT_SINK=sheets needs GOOGLE_CREDS_JSON and AUDIT_SPREADSHEET_ID',
    );
  }

  if (validatedConfig.AUDIT_SINK === AuditSinkKind.PG && !validatedConfig.PG_HOST) {
    throw new Error('Invalid environment configuration: AUDIT_SINK=pg needs PG_HOST');
  }

  return validatedConfig;
}

import { plainToInstance } from 'class-transformer'
import { IsEmail, IsIn, IsInt, IsOptional, IsString, IsUrl, Matches, Max, Min, validateSync } from 'class-validator'

const BOOLEAN_STRINGS = ['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off']

/** Keys checked at boot; anything not listed here is passed through untouched. */
export class EnvironmentVariables {
  @IsOptional() @IsIn(['development', 'production', 'test']) NODE_ENV?: string
  @IsOptional() @IsInt() @Min(1) @Max(65535) API_PORT?: number
  @IsOptional() @IsString() FRONTEND_URLS?: string

  @IsOptional() @IsIn(['anthropic', 'openai']) DEFAULT_LLM_PROVIDER?: string
  @IsOptional() @IsString() LLM_MODEL?: string
  @IsOptional() @IsInt() @Min(1000) @Max(600_000) LLM_TIMEOUT_MS?: number
  @IsOptional() @IsInt() @Min(256) @Max(32_000) LLM_MAX_TOKENS?: number
  @IsOptional() @IsInt() @Min(1) @Max(12) AGENT_MAX_TOOL_ROUNDS?: number
  @IsOptional() @IsInt() @Min(500) @Max(100_000) TOOL_RESULT_MAX_CHARS?: number

  @IsOptional() @Matches(/^postgres(ql)?:\/\//, { message: 'DATABASE_URL must be a postgres:// connection string' })
  DATABASE_URL?: string

  @IsOptional() @IsInt() @Min(1) @Max(100) DATABASE_POOL_MAX?: number
  @IsOptional() @IsInt() @Min(1000) @Max(300_000) SQL_TIMEOUT_MS?: number
  @IsOptional() @IsInt() @Min(1) @Max(10_000) SQL_MAX_ROWS?: number
  @IsOptional() @Matches(/^[A-Za-z_][A-Za-z0-9_]*$/) SQL_SCHEMA?: string
  @IsOptional() @IsString() SQL_ALLOWED_TABLES?: string
  @IsOptional() @IsInt() @Min(0) SCHEMA_CACHE_TTL_MS?: number

  @IsOptional() @IsString() ARTIFACT_BUCKET?: string
  @IsOptional() @IsString() ARTIFACT_PREFIX?: string
  @IsOptional() @IsString() AWS_REGION?: string
  @IsOptional() @IsUrl({ require_tld: false }) S3_ENDPOINT?: string
  @IsOptional() @IsIn(BOOLEAN_STRINGS) S3_FORCE_PATH_STYLE?: string
  @IsOptional() @IsInt() @Min(1) @Max(10_080) ARTIFACT_DEFAULT_EXPIRY_MINUTES?: number
  @IsOptional() @IsInt() @Min(1000) @Max(120_000) STORAGE_TIMEOUT_MS?: number

  @IsOptional() @IsEmail() EMAIL_FROM_ADDRESS?: string
  @IsOptional() @IsString() EMAIL_FROM_NAME?: string
  @IsOptional() @IsInt() @Min(1000) @Max(120_000) EMAIL_TIMEOUT_MS?: number

  @IsOptional() @IsInt() @Min(1000) CONSENT_TIMEOUT_MS?: number
  @IsOptional() @IsInt() @Min(0) RESOLVED_ACTION_RETENTION_MS?: number
}

export function validate(config: Record<string, unknown>) {
  // blank entries count as unset
  const present = Object.fromEntries(Object.entries(config).filter(([, value]) => value !== ''))
  const validated = plainToInstance(EnvironmentVariables, present, { enableImplicitConversion: true })
  const errors = validateSync(validated)
  if (errors.length > 0) {
    const problems = errors.map((error) => `- ${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
    throw new Error(`Invalid environment configuration:\n${problems.join('\n')}`)
  }
  return validated
}

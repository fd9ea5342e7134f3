import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { LOG_LEVEL_NAMES, LogLevelName } from './log-levels';

export enum StorageType {
  MOCK = 'mock',
  TYPEORM = 'typeorm',
}

const parseBoolean = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() === 'true' : value;

/**
 * Environment schema, validated once at startup
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  STRIPE_SECRET_KEY!: string;

  @IsString()
  @IsNotEmpty()
  STRIPE_WEBHOOK_SECRET!: string;

  /**
   * svix signing secret of the identity provider; unset disables the check
   */
  @IsOptional()
  @IsString()
  IDENTITY_WEBHOOK_SECRET?: string;

  @IsEnum(StorageType)
  STORAGE_TYPE: StorageType = StorageType.TYPEORM;

  @IsString()
  DB_HOST = 'localhost';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  DB_PORT = 5432;

  @IsString()
  DB_USERNAME = 'usersync';

  @IsString()
  DB_PASSWORD = 'usersync';

  @IsString()
  DB_NAME = 'usersync';

  @Transform(parseBoolean)
  @IsBoolean()
  DB_SYNCHRONIZE = false;

  @Transform(parseBoolean)
  @IsBoolean()
  DB_LOGGING = false;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT = 8001;

  @IsIn(LOG_LEVEL_NAMES)
  LOG_LEVEL: LogLevelName = 'log';
}

/**
 * ConfigModule `validate` hook: coerce and check process environment
 * @throws Error listing every violated constraint
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const violations = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new Error(
      `Invalid environment configuration: ${violations.join('; ')}`,
    );
  }

  return validated;
}

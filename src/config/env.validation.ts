import { plainToInstance } from 'class-transformer';
import { IsEnum, IsIn, IsNumber, IsString, Length, Max, Min, validateSync } from 'class-validator';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

export class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.Development;

  @IsNumber()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsIn(['error', 'warn', 'info', 'debug', 'verbose'])
  LOG_LEVEL: string = 'info';

  // Database
  @IsString()
  DB_HOST: string = 'localhost';

  @IsNumber()
  @Min(1)
  @Max(65535)
  DB_PORT: number = 5432;

  @IsString()
  DB_USERNAME: string = 'booking_user';

  @IsString()
  DB_PASSWORD: string = 'booking_pass';

  @IsString()
  DB_DATABASE: string = 'booking_db';

  // RabbitMQ
  @IsString()
  RABBITMQ_HOST: string = 'localhost';

  @IsNumber()
  @Min(1)
  @Max(65535)
  RABBITMQ_PORT: number = 5672;

  @IsString()
  RABBITMQ_USER: string = 'booking_user';

  @IsString()
  RABBITMQ_PASSWORD: string = 'booking_pass';

  // Holds
  @IsNumber()
  @Min(30)
  @Max(3600)
  HOLD_TTL_SECONDS: number = 600;

  @IsNumber()
  @Min(1000)
  @Max(600000)
  HOLD_SWEEP_INTERVAL_MS: number = 30000;

  @IsNumber()
  @Min(1)
  @Max(5000)
  HOLD_SWEEP_BATCH_SIZE: number = 200;

  @IsNumber()
  @Min(0)
  @Max(3600)
  HOLD_EXTENSION_SECONDS: number = 300;

  @IsNumber()
  @Min(0)
  @Max(10)
  HOLD_MAX_EXTENSIONS: number = 1;

  @IsNumber()
  @Min(1)
  @Max(50)
  MAX_SEATS_PER_HOLD: number = 10;

  // Payments & pricing
  @IsNumber()
  @Min(1000)
  @Max(30000)
  PAYMENT_TIMEOUT_MS: number = 30000;

  @IsNumber()
  @Min(0)
  CONVENIENCE_FEE_PER_SEAT: number = 1.5;

  @IsString()
  @Length(3, 3)
  CURRENCY: string = 'USD';

  // Cancellation policy
  @IsNumber()
  @Min(0)
  CANCELLATION_CUTOFF_MINUTES: number = 120;

  @IsNumber()
  @Min(0)
  FULL_REFUND_HOURS: number = 24;

  @IsNumber()
  @Min(0)
  @Max(100)
  PARTIAL_REFUND_PERCENT: number = 50;

  // Rate limiting
  @IsNumber()
  @Min(1)
  @Max(1000)
  RATE_LIMIT_TTL: number = 60;

  @IsNumber()
  @Min(1)
  @Max(10000)
  RATE_LIMIT_MAX: number = 100;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }

  return validatedConfig;
}

/**
 * Reads process.env through the same validation used by ConfigModule, so
 * registerAs factories see typed values with defaults applied.
 */
export function readEnvironment(): EnvironmentVariables {
  return validate({ ...process.env });
}

import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import configuration from './configuration';

export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @IsNumber()
  PORT?: number;

  @IsOptional()
  @IsString()
  API_PREFIX?: string;

  @IsString()
  @IsNotEmpty()
  DATABASE_URL!: string;

  @IsOptional()
  @IsString()
  REDIS_URL?: string;

  @IsString()
  @IsNotEmpty()
  STORAGE_BUCKET!: string;

  @IsString()
  @IsNotEmpty()
  STORAGE_ACCESS_KEY_ID!: string;

  @IsString()
  @IsNotEmpty()
  STORAGE_SECRET_ACCESS_KEY!: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  STORAGE_ENDPOINT?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  STORAGE_PUBLIC_BASE_URL?: string;

  @IsString()
  @IsNotEmpty()
  IMAGE_API_KEY!: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  IMAGE_API_QUEUE_URL?: string;

  @IsOptional()
  @IsNumber()
  @Min(100)
  IMAGE_API_POLL_INTERVAL_MS?: number;

  @IsOptional()
  @IsNumber()
  @Min(1)
  IMAGE_API_MAX_POLLS?: number;

  @IsOptional()
  @IsString()
  GOOGLE_API_KEY?: string;

  @IsOptional()
  @IsNumber()
  @Min(1)
  BOOK_PREVIEW_PAGES?: number;

  @IsOptional()
  @IsNumber()
  @Min(1)
  BOOK_TOTAL_PAGES?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  PREVIEW_MIN_SUCCESS_RATIO?: number;

  @IsOptional()
  @IsNumber()
  @Min(1)
  BOOK_COMPLETION_RETRIES?: number;

  @IsOptional()
  @IsNumber()
  @Min(1)
  UPLOAD_MAX_PHOTO_BYTES?: number;

  @IsOptional()
  @IsIn(['true', 'false'])
  FACE_VALIDATION_ENABLED?: string;

  @IsOptional()
  @IsIn(['true', 'false'])
  RATE_LIMIT_ENABLED?: string;

  @IsOptional()
  @IsNumber()
  @Min(1)
  RATE_LIMIT_PER_MINUTE?: number;

  @IsOptional()
  @IsString()
  SHOPIFY_WEBHOOK_SECRET?: string;

  @IsOptional()
  @IsString()
  SHOPIFY_SHOP_DOMAIN?: string;

  @IsOptional()
  @IsString()
  RESEND_API_KEY?: string;

  @IsOptional()
  @IsString()
  CORS_ORIGIN?: string;
}

export function validate(config: Record<string, unknown>) {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validated, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(
      `Invalid environment configuration: ${errors
        .map((err) => Object.values(err.constraints || {}).join(', '))
        .join('; ')}`,
    );
  }

  return validated;
}

@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      validate,
      cache: true,
      expandVariables: true,
    }),
  ],
})
export class ConfigModule {}

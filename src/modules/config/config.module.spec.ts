import 'reflect-metadata';
import { validate } from './config.module';

const baseEnv = {
  DATABASE_URL: 'postgres://localhost:5432/storybook',
  STORAGE_BUCKET: 'books',
  STORAGE_ACCESS_KEY_ID: 'test-key',
  STORAGE_SECRET_ACCESS_KEY: 'test-secret',
  IMAGE_API_KEY: 'test-image-key',
};

describe('environment validation', () => {
  it('accepts a minimal environment and converts numbers', () => {
    const validated = validate({ ...baseEnv, PORT: '4000' });
    expect(validated.PORT).toBe(4000);
  });

  it('rejects a missing database url', () => {
    const { DATABASE_URL: _omitted, ...rest } = baseEnv;
    expect(() => validate(rest)).toThrow('Invalid environment configuration');
  });

  it('rejects a success ratio above 1', () => {
    expect(() => validate({ ...baseEnv, PREVIEW_MIN_SUCCESS_RATIO: '1.5' })).toThrow(
      'PREVIEW_MIN_SUCCESS_RATIO must not be greater than 1',
    );
  });

  it('rejects a rate limit below one request per minute', () => {
    expect(() => validate({ ...baseEnv, RATE_LIMIT_PER_MINUTE: '0' })).toThrow(
      'RATE_LIMIT_PER_MINUTE must not be less than 1',
    );
  });
});

// Required environment for modules that validate process.env when imported
// (ConfigModule.forRoot runs its validator at module load).
const testEnv: Record<string, string> = {
  DATABASE_URL: 'postgres://localhost:5432/storybook',
  STORAGE_BUCKET: 'books',
  STORAGE_ACCESS_KEY_ID: 'test-key',
  STORAGE_SECRET_ACCESS_KEY: 'test-secret',
  IMAGE_API_KEY: 'test-image-key',
};

for (const [key, value] of Object.entries(testEnv)) {
  if (process.env[key] === undefined) {
    process.env[key] = value;
  }
}

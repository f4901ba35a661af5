const int = (value: string | undefined, fallback: number) => {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const float = (value: string | undefined, fallback: number) => {
  const parsed = value === undefined ? NaN : parseFloat(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export default () => {
  const isProduction = process.env.NODE_ENV === 'production';
  const frontendUrl =
    process.env.FRONTEND_URL ||
    (isProduction ? 'https://storybook.example.com' : 'http://localhost:5173');

  return {
    app: {
      port: int(process.env.PORT, 3001),
      apiPrefix: process.env.API_PREFIX || 'api',
      frontendUrl,
    },
    database: {
      url: process.env.DATABASE_URL,
      poolSize: int(process.env.DATABASE_POOL_SIZE, 4),
    },
    redis: {
      url: process.env.REDIS_URL || 'redis://localhost:6379',
    },
    storage: {
      endpoint: process.env.STORAGE_ENDPOINT,
      region: process.env.STORAGE_REGION || 'us-east-1',
      bucket: process.env.STORAGE_BUCKET,
      accessKeyId: process.env.STORAGE_ACCESS_KEY_ID,
      secretAccessKey: process.env.STORAGE_SECRET_ACCESS_KEY,
      publicBaseUrl: process.env.STORAGE_PUBLIC_BASE_URL,
      signedUrlTtlSeconds: int(process.env.STORAGE_SIGNED_URL_TTL_SECONDS, 3600),
    },
    genai: {
      apiKey: process.env.GOOGLE_API_KEY,
      visionModel: process.env.GOOGLE_VISION_MODEL || 'gemini-2.0-flash',
    },
    imageGeneration: {
      apiKey: process.env.IMAGE_API_KEY,
      queueUrl: process.env.IMAGE_API_QUEUE_URL || 'https://queue.fal.run',
      pollIntervalMs: int(process.env.IMAGE_API_POLL_INTERVAL_MS, 5000),
      maxPolls: int(process.env.IMAGE_API_MAX_POLLS, 60),
    },
    book: {
      previewPageCount: int(process.env.BOOK_PREVIEW_PAGES, 5),
      totalPageCount: int(process.env.BOOK_TOTAL_PAGES, 10),
      previewExpiryDays: int(process.env.PREVIEW_EXPIRY_DAYS, 7),
      downloadExpiryDays: int(process.env.DOWNLOAD_EXPIRY_DAYS, 30),
      purchaseGraceHours: int(process.env.PURCHASE_GRACE_HOURS, 24),
      maxCompletionRetries: int(process.env.BOOK_COMPLETION_RETRIES, 3),
      retryBaseDelayMs: int(process.env.BOOK_RETRY_BASE_DELAY_MS, 1000),
      previewMinSuccessRatio: float(process.env.PREVIEW_MIN_SUCCESS_RATIO, 0),
      maxJobAttempts: int(process.env.PREVIEW_JOB_MAX_ATTEMPTS, 3),
    },
    uploads: {
      maxPhotoBytes: int(process.env.UPLOAD_MAX_PHOTO_BYTES, 10 * 1024 * 1024),
      faceValidation: process.env.FACE_VALIDATION_ENABLED !== 'false',
    },
    rateLimit: {
      enabled: process.env.RATE_LIMIT_ENABLED !== 'false',
      requestsPerMinute: int(process.env.RATE_LIMIT_PER_MINUTE, 200),
    },
    shopify: {
      webhookSecret: process.env.SHOPIFY_WEBHOOK_SECRET,
      shopDomain: process.env.SHOPIFY_SHOP_DOMAIN,
    },
    email: {
      resendApiKey: process.env.RESEND_API_KEY,
      fromAddress: process.env.EMAIL_FROM || 'Storybook <books@example.com>',
    },
    cors: {
      origin: process.env.CORS_ORIGIN || '*',
    },
  };
};

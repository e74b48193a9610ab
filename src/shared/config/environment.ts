import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const booleanString = (defaultValue: boolean) =>
  z
    .enum(["true", "false"])
    .default(defaultValue ? "true" : "false")
    .transform((val) => val === "true");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  APP_NAME: z.string().default("Dental Clinic Manager"),
  API_VERSION: z.string().default("v1"),

  // Database
  DATABASE_PROVIDER: z.enum(["mysql", "memory"]).default("memory"),
  DB_HOST: z.string().default("localhost"),
  DB_PORT: z.coerce.number().int().positive().default(3306),
  DB_NAME: z.string().default("dental_clinic"),
  DB_USER: z.string().default("clinic"),
  DB_PASSWORD: z.string().default(""),
  DB_CONNECTION_LIMIT: z.coerce.number().int().positive().default(10),

  // Redis (message broker)
  REDIS_ENABLED: booleanString(false),
  REDIS_HOST: z.string().default("localhost"),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  EVENTS_CHANNEL: z.string().default("clinic.events"),
  USER_CREATED_CHANNEL: z.string().default("manager.user.created"),

  // Scheduling
  CLINIC_TIMEZONE: z
    .string()
    .default("UTC")
    .refine((zone) => {
      try {
        new Intl.DateTimeFormat("en-US", { timeZone: zone });
        return true;
      } catch {
        return false;
      }
    }, "CLINIC_TIMEZONE must be a valid IANA timezone"),

  // Auth API
  AUTH_API_ENABLED: booleanString(false),
  AUTH_API_BASE_URL: z.string().url().default("http://localhost:5001"),
  AUTH_API_KEY: z.string().optional(),
  AUTH_API_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(30),

  // Email
  EMAIL_ENABLED: booleanString(false),
  SMTP_HOST: z.string().default("localhost"),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_SECURE: booleanString(false),
  SMTP_USER: z.string().optional(),
  SMTP_PASSWORD: z.string().optional(),
  EMAIL_SENDER_ADDRESS: z.string().email().default("no-reply@clinic.local"),
  EMAIL_SENDER_NAME: z.string().default("Dental Clinic"),

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(900000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),

  // Logging
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_FORMAT: z.enum(["pretty", "json"]).default("pretty"),

  // CORS
  ALLOWED_ORIGINS: z.string().default("http://localhost:3000"),

  // Swagger
  SWAGGER_ENABLED: booleanString(true),
});

export type Environment = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid environment variables:", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const env: Environment = parsed.data;

export const config = {
  app: {
    name: env.APP_NAME,
    port: env.PORT,
    env: env.NODE_ENV,
    apiVersion: env.API_VERSION,
    isDevelopment: env.NODE_ENV === "development",
    isProduction: env.NODE_ENV === "production",
    isTest: env.NODE_ENV === "test",
  },

  database: {
    provider: env.DATABASE_PROVIDER,
    host: env.DB_HOST,
    port: env.DB_PORT,
    name: env.DB_NAME,
    user: env.DB_USER,
    password: env.DB_PASSWORD,
    connectionLimit: env.DB_CONNECTION_LIMIT,
  },

  redis: {
    enabled: env.REDIS_ENABLED,
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    password: env.REDIS_PASSWORD,
    db: env.REDIS_DB,
  },

  messaging: {
    eventsChannel: env.EVENTS_CHANNEL,
    userCreatedChannel: env.USER_CREATED_CHANNEL,
  },

  scheduling: {
    timezone: env.CLINIC_TIMEZONE,
  },

  authApi: {
    enabled: env.AUTH_API_ENABLED,
    baseUrl: env.AUTH_API_BASE_URL,
    apiKey: env.AUTH_API_KEY,
    timeoutSeconds: env.AUTH_API_TIMEOUT_SECONDS,
  },

  email: {
    enabled: env.EMAIL_ENABLED,
    smtpHost: env.SMTP_HOST,
    smtpPort: env.SMTP_PORT,
    secure: env.SMTP_SECURE,
    username: env.SMTP_USER,
    password: env.SMTP_PASSWORD,
    senderAddress: env.EMAIL_SENDER_ADDRESS,
    senderName: env.EMAIL_SENDER_NAME,
  },

  rateLimit: {
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
  },

  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
  },

  cors: {
    origins: env.ALLOWED_ORIGINS.split(",").map((origin) => origin.trim()),
  },

  swagger: {
    enabled: env.SWAGGER_ENABLED,
  },
} as const;

export type Config = typeof config;

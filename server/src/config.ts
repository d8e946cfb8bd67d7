import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv({
  path: path.resolve(process.cwd(), '.env'),
});

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  WS_PATH: z.string().startsWith('/').default('/ws'),
  WS_HEARTBEAT_MS: z.coerce.number().int().positive().default(15_000),
  WS_MAX_BUFFERED_BYTES: z.coerce.number().int().positive().default(4 * 1024 * 1024),
  CAPTURE_FPS: z.coerce.number().int().positive().default(5),
  IDLE_POLL_MS: z.coerce.number().int().positive().default(500),
  SOURCE_RETRY_MS: z.coerce.number().int().positive().default(1000),
  VIEWPORT_WIDTH: z.coerce.number().int().positive().default(1280),
  VIEWPORT_HEIGHT: z.coerce.number().int().positive().default(720),
  START_URL: z.string().url().default('https://example.com'),
  JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(60),
  DEFAULT_URL_SCHEME: z
    .string()
    .regex(/^[a-z][a-z\d+.-]*$/i)
    .default('http'),
  MIRROR_ENABLED: booleanFlag,
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:5173,http://127.0.0.1:5173'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  LOG_PRETTY: booleanFlag,
});

export function parseConfig(env: NodeJS.ProcessEnv) {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    wsPath: parsed.WS_PATH,
    heartbeatMs: parsed.WS_HEARTBEAT_MS,
    maxBufferedBytes: parsed.WS_MAX_BUFFERED_BYTES,
    captureFps: parsed.CAPTURE_FPS,
    idlePollMs: parsed.IDLE_POLL_MS,
    sourceRetryMs: parsed.SOURCE_RETRY_MS,
    viewport: {
      width: parsed.VIEWPORT_WIDTH,
      height: parsed.VIEWPORT_HEIGHT,
    },
    startUrl: parsed.START_URL,
    jpegQuality: parsed.JPEG_QUALITY,
    defaultUrlScheme: parsed.DEFAULT_URL_SCHEME.toLowerCase(),
    mirrorEnabled: parsed.MIRROR_ENABLED,
    corsOrigins: parsed.CORS_ORIGINS.split(',').map((origin) => origin.trim()),
    logLevel: parsed.LOG_LEVEL,
    logPretty: parsed.LOG_PRETTY,
  };
}

export const config = parseConfig(process.env);

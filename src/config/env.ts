import { z } from "zod";

const booleanString = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

// Unset and empty both mean "not configured"
const optionalString = z
  .string()
  .optional()
  .transform((value) => value || undefined);

const envSchema = z.object({
  // Server
  PORT: z.string().default("3000").transform(Number),
  HOST: z.string().default("localhost"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  // PostgreSQL Database
  POSTGRES_HOST: z.string().default("localhost"),
  POSTGRES_PORT: z.string().default("5432").transform(Number),
  POSTGRES_DB: z.string().default("frame_extractor_db"),
  POSTGRES_USER: z.string(),
  POSTGRES_PASSWORD: z.string(),
  POSTGRES_MAX_CONNECTIONS: z.string().default("10").transform(Number),

  // Video Processing
  FFMPEG_PATH: z.string().default("/usr/bin/ffmpeg"),
  FFPROBE_PATH: z.string().default("/usr/bin/ffprobe"),

  // Frame Extraction
  FALLBACK_FRAME_CANDIDATES: z
    .string()
    .default("10")
    .transform(Number)
    .pipe(z.number().int().positive().max(1000)),
  STRICT_INTERVAL: booleanString,

  // Media Library
  MEDIA_LIBRARY_DIR: z.string().default("./data/media-library"),

  // Archive batch (channel VODs)
  TWITCH_CHANNEL: optionalString,
  TWITCH_CLIENT_ID: optionalString,
  TWITCH_APP_ACCESS_TOKEN: optionalString,
  TWITCH_API_URL: z.string().url().default("https://api.twitch.tv/helix"),
  TWITCH_API_TIMEOUT_MS: z.string().default("15000").transform(Number),
  YT_DLP_PATH: z.string().default("yt-dlp"),
  BATCH_OUTPUT_DIR: z.string().default("./data/archive-frames"),
  BATCH_INTERVAL_SECONDS: z
    .string()
    .default("2")
    .transform(Number)
    .pipe(z.number().int().positive()),
  BATCH_RECENT_LIMIT: z
    .string()
    .default("5")
    .transform(Number)
    .pipe(z.number().int().min(1).max(100)),
});

function loadEnv() {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();

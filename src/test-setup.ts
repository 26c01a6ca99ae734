import { afterAll } from "vitest";
import { rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

const TEST_MEDIA_LIBRARY_DIR = join(
  tmpdir(),
  `frame-extractor-media-${process.pid}-${Date.now()}`,
);

// Set test environment before any module reads it
process.env.NODE_ENV = "test";
process.env.POSTGRES_USER = "test";
process.env.POSTGRES_PASSWORD = "test-password";
process.env.MEDIA_LIBRARY_DIR = TEST_MEDIA_LIBRARY_DIR;
process.env.FFMPEG_PATH = "ffmpeg";
process.env.FFPROBE_PATH = "ffprobe";
delete process.env.STRICT_INTERVAL;
delete process.env.FALLBACK_FRAME_CANDIDATES;
delete process.env.TWITCH_CHANNEL;
delete process.env.TWITCH_CLIENT_ID;
delete process.env.TWITCH_APP_ACCESS_TOKEN;

afterAll(() => {
  rmSync(TEST_MEDIA_LIBRARY_DIR, { recursive: true, force: true });
});

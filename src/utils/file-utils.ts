import { xxh3 } from "@node-rs/xxhash";
import { createReadStream, constants } from "fs";
import { access, mkdir, stat } from "fs/promises";
import { extname } from "path";
import { SUPPORTED_VIDEO_FORMATS } from "@/config/constants";

const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set(SUPPORTED_VIDEO_FORMATS);

export function isVideoFile(filePath: string): boolean {
  const ext = extname(filePath).toLowerCase();
  return SUPPORTED_EXTENSIONS.has(ext);
}

/**
 * Resolves true only for an existing regular file (directories don't count).
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await stat(filePath);
    return stats.isFile();
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }
}

export async function isReadableFile(filePath: string): Promise<boolean> {
  if (!(await fileExists(filePath))) {
    return false;
  }

  try {
    await access(filePath, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Creates the directory if needed and checks that the process can write to it.
 */
export async function ensureWritableDirectory(directory: string): Promise<boolean> {
  try {
    await mkdir(directory, { recursive: true });
    const stats = await stat(directory);
    if (!stats.isDirectory()) {
      return false;
    }
    await access(directory, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Streams the file through XXH3-64. Extracted frames are small, so the whole
 * content is hashed rather than sampled.
 */
export async function computeFileHash(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hasher = xxh3.Xxh3.withSeed(0n);

    const stream = createReadStream(filePath, {
      highWaterMark: 256 * 1024,
    });

    stream.on("data", (chunk) => {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      hasher.update(buffer);
    });

    stream.on("end", () => {
      resolve(hasher.digest().toString(16).padStart(16, "0"));
    });

    stream.on("error", reject);
  });
}

export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 Bytes";

  const k = 1024;
  const sizes = ["Bytes", "KB", "MB", "GB", "TB"];
  const i = Math.floor(Math.log(bytes) / Math.log(k));

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i]}`;
}

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

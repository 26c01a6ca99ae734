/**
 * Request and command building for interval frame extraction.
 * Pure functions: no filesystem access, no process spawning.
 */

import { join } from 'path';
import { z } from 'zod';
import {
  FRAME_BASENAME,
  FRAME_EXTENSION,
  FRAME_INDEX_WIDTH,
  FRAME_START_INDEX,
} from '@/config/constants';
import type {
  ExtractionCommand,
  ExtractionRequest,
  ResolvedInterval,
} from './frame-extraction.types';

export const DEFAULT_INTERVAL_SECONDS = 10;
export const FALLBACK_FRAME_CANDIDATES = 10;

const intervalSchema = z.union([
  z.number().int().positive().safe(),
  z
    .string()
    .trim()
    .regex(/^\d+$/)
    .transform(Number)
    .pipe(z.number().int().positive().safe()),
]);

/**
 * Parses a user-typed interval. Anything that is not a positive integer
 * resolves to DEFAULT_INTERVAL_SECONDS instead of failing.
 */
export function resolveIntervalSeconds(raw: unknown): ResolvedInterval {
  const result = intervalSchema.safeParse(raw);

  if (!result.success) {
    return { intervalSeconds: DEFAULT_INTERVAL_SECONDS, usedFallback: true };
  }

  return { intervalSeconds: result.data, usedFallback: false };
}

export function createExtractionRequest(params: {
  sourcePath: string;
  destinationDirectory: string;
  intervalSeconds: number;
}): ExtractionRequest {
  return Object.freeze({
    sourcePath: params.sourcePath,
    destinationDirectory: params.destinationDirectory,
    intervalSeconds: params.intervalSeconds,
  });
}

// "one frame every N seconds"
export function buildSamplingFilter(intervalSeconds: number): string {
  return `fps=1/${intervalSeconds}`;
}

// image2 reads `%` as a sequence specifier anywhere in the pattern
export function buildOutputPattern(destinationDirectory: string): string {
  return join(
    destinationDirectory.replace(/%/g, '%%'),
    `${FRAME_BASENAME}_%0${FRAME_INDEX_WIDTH}d.${FRAME_EXTENSION}`,
  );
}

export function frameFilePath(destinationDirectory: string, index: number): string {
  const padded = String(index).padStart(FRAME_INDEX_WIDTH, '0');
  return join(destinationDirectory, `${FRAME_BASENAME}_${padded}.${FRAME_EXTENSION}`);
}

export function candidateFramePaths(destinationDirectory: string, count: number): string[] {
  const paths: string[] = [];
  for (let i = 0; i < count; i++) {
    paths.push(frameFilePath(destinationDirectory, FRAME_START_INDEX + i));
  }
  return paths;
}

/**
 * Number of frames the fps filter emits for a known duration: one at t=0,
 * then one per full interval. Unknown durations get the fixed fallback.
 */
export function expectedFrameCount(
  durationSeconds: number | null,
  intervalSeconds: number,
  fallback: number = FALLBACK_FRAME_CANDIDATES,
): number {
  if (durationSeconds === null || !Number.isFinite(durationSeconds) || durationSeconds <= 0) {
    return fallback;
  }

  return Math.floor(durationSeconds / intervalSeconds) + 1;
}

export function buildExtractionCommand(request: ExtractionRequest): ExtractionCommand {
  const filter = buildSamplingFilter(request.intervalSeconds);
  const outputPattern = buildOutputPattern(request.destinationDirectory);

  // image2 numbers from 1 unless told otherwise
  const args = [
    '-hide_banner',
    '-y',
    '-i',
    request.sourcePath,
    '-vf',
    filter,
    '-start_number',
    String(FRAME_START_INDEX),
    outputPattern,
  ];

  return {
    input: request.sourcePath,
    filter,
    outputPattern,
    args,
  };
}

const SHELL_SAFE = /^[\w@%+=:,./-]+$/;

export function formatCommandLine(executable: string, args: readonly string[]): string {
  return [executable, ...args]
    .map((arg) => (SHELL_SAFE.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}

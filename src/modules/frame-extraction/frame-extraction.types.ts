/**
 * Frame Extraction Types
 * Request, command and outcome shapes for the extraction pipeline
 */

import type { MediaItem } from '@/modules/media-library/media-library.types';

/**
 * One extraction, built fresh per call and frozen.
 */
export interface ExtractionRequest {
  readonly sourcePath: string;
  readonly destinationDirectory: string;
  readonly intervalSeconds: number; // Positive integer, one frame per interval
}

/**
 * Raw caller input, before validation. `interval` is whatever the user typed.
 */
export interface ExtractionInput {
  sourcePath?: string | null;
  destinationDirectory?: string | null;
  interval?: unknown;
}

export interface ResolvedInterval {
  intervalSeconds: number;
  usedFallback: boolean;
}

/**
 * A fully-formed ffmpeg invocation
 */
export interface ExtractionCommand {
  input: string;
  filter: string; // e.g. fps=1/10
  outputPattern: string; // e.g. /out/image_%03d.jpg
  args: readonly string[];
}

/**
 * Completion signal from the external engine
 */
export interface EngineResult {
  returnCode: number;
  stderr: string;
}

export interface FrameExtractionEngine {
  execute(command: ExtractionCommand): Promise<EngineResult>;
}

export interface VideoDurationProbe {
  probeDuration(videoPath: string): Promise<number | null>;
}

export interface FailedHandoff {
  filePath: string;
  message: string;
}

export type ExtractionFailureStatus =
  | 'permission-denied'
  | 'selection-cancelled'
  | 'invalid-source'
  | 'invalid-interval'
  | 'invalid-destination'
  | 'engine-failed'
  | 'busy';

export interface ExtractionSucceeded {
  status: 'succeeded';
  request: ExtractionRequest;
  intervalFallback: boolean;
  commandLine: string;
  checkedPaths: string[];
  producedFiles: string[];
  savedItems: MediaItem[];
  failedHandoffs: FailedHandoff[];
  elapsedMs: number;
}

export interface ExtractionEngineFailed {
  status: 'engine-failed';
  request: ExtractionRequest;
  commandLine: string;
  returnCode: number;
  message: string;
}

export interface ExtractionRejected {
  status: Exclude<ExtractionFailureStatus, 'engine-failed'>;
  message: string;
}

export type ExtractionOutcome =
  | ExtractionSucceeded
  | ExtractionEngineFailed
  | ExtractionRejected;

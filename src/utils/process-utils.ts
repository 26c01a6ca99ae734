/**
 * Child process helpers for the external tools (ffmpeg, yt-dlp)
 */
import { spawn } from 'child_process';
import { logger } from '@/utils/logger';

export interface ProcessResult {
  returnCode: number;
  stderr: string;
}

// Keep only the tail of stderr, which carries the actual error
const MAX_STDERR_CHARS = 16 * 1024;

/**
 * Runs a tool to completion. Never rejects: a tool that cannot be started
 * reports -1 with the spawn error as stderr, one killed by a signal reports -1.
 */
export function runProcess(
  executable: string,
  args: readonly string[],
  label: string,
): Promise<ProcessResult> {
  return new Promise((resolve) => {
    let stderr = '';
    let settled = false;

    const finish = (result: ProcessResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    logger.debug({ args }, `Starting ${label}`);

    const child = spawn(executable, [...args]);

    // Decode across chunk boundaries so multi-byte characters stay whole
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (data: string) => {
      stderr += data;
      if (stderr.length > MAX_STDERR_CHARS) {
        stderr = stderr.slice(-MAX_STDERR_CHARS);
      }
    });

    child.on('close', (code, signal) => {
      const returnCode = code ?? -1;
      logger.debug({ returnCode, signal }, `${label} exited`);
      finish({ returnCode, stderr });
    });

    child.on('error', (error) => {
      logger.error({ error, executable }, `${label} could not be started`);
      finish({ returnCode: -1, stderr: error.message });
    });
  });
}

export function lastStderrLine(stderr: string): string | undefined {
  const lines = stderr
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines[lines.length - 1];
}

/**
 * Frame Extraction Module
 * Interval frame sampling with ffmpeg, handed off to the media library
 */

export * from './frame-extraction.types';
export * from './frame-extraction.command';
export * from './frame-extraction.ffmpeg';
export * from './frame-extraction.service';

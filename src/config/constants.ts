export const SUPPORTED_VIDEO_FORMATS = [
  '.mkv',
  '.mp4',
  '.mov',
  '.wmv',
  '.avi',
  '.flv',
  '.webm',
  '.m4v',
  '.mpg',
  '.mpeg',
  '.3gp',
] as const;

export const API_PREFIX = '/api';

// Output frames are written as image_000.jpg, image_001.jpg, ...
export const FRAME_BASENAME = 'image';
export const FRAME_INDEX_WIDTH = 3;
export const FRAME_EXTENSION = 'jpg';
export const FRAME_START_INDEX = 0;

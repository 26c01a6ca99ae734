/**
 * Media Library Module
 */

export * from './media-library.types';
export * from './media-library.service';

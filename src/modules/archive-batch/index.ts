/**
 * Archive Batch Module
 * Channel archive videos downloaded and sampled into frame folders
 */

export * from './archive-batch.types';
export * from './archive-batch.service';

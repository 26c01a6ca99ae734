export * from './storage-permission.types';
export * from './storage-permission.service';

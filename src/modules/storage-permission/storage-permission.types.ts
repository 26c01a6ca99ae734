export type PermissionStatus = 'granted' | 'denied';

/**
 * Capability check that must report "granted" before any file is accepted
 */
export interface StoragePermissionGate {
  status(): Promise<PermissionStatus>;
  request(): Promise<PermissionStatus>;
}

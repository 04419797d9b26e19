/**
 * Local Storage Error Types
 */

export type StorageWriteError = {
  type: 'StorageQuotaExceeded' | 'StorageWriteFailed';
  message: string;
};

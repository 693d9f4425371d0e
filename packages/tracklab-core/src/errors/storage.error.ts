import { BaseError } from './base.error';

/**
 * Storage error - object download, upload or delete failed
 */
export class StorageError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', 502, context);
  }
}

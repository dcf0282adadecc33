import type { RecordSet } from '../types';

export interface RowStorage {
  /**
   * Persists a record set. `target` is a path for file-based storage.
   */
  write(target: string, rows: RecordSet): Promise<void>;

  read(target: string): Promise<RecordSet>;
}

export class StorageError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'StorageError';
  }
}

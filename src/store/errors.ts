import type { DocumentName } from './documents.js';

export type StoreErrorCode = 'document_missing' | 'document_corrupt' | 'document_invalid' | 'write_failed';

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly code: StoreErrorCode,
    public readonly context: { document?: DocumentName; cause?: unknown } = {}
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

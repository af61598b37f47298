export type WeekBatchErrorCode =
  | 'empty_batch'
  | 'duplicate_event'
  | 'event_already_processed'
  | 'invalid_placement'
  | 'week_out_of_order';

export class WeekBatchError extends Error {
  constructor(
    message: string,
    public readonly code: WeekBatchErrorCode,
    public readonly context: { eventIds?: string[]; week?: number } = {}
  ) {
    super(message);
    this.name = 'WeekBatchError';
  }
}

import type { Uid } from '../core/types.js';
import { MAX_UIDS } from '../core/config.js';
import { ValidationError } from '../core/errors.js';

/**
 * Splits a mailbox's UIDs into request-sized batches without reordering them.
 * Every batch is full except possibly the last; an empty batch is never yielded.
 */
export function* batchUids(uids: Iterable<Uid>, size: number = MAX_UIDS): Generator<Uid[]> {
  if (!Number.isInteger(size) || size < 1) {
    throw new ValidationError(`Batch size must be a positive integer, got ${size}`);
  }

  let batch: Uid[] = [];
  for (const uid of uids) {
    batch.push(uid);
    if (batch.length === size) {
      yield batch;
      batch = [];
    }
  }
  if (batch.length > 0) {
    yield batch;
  }
}

import { coerceTimestamp } from '@/common/utils/date.utils';
import { ReviewStoreIntegrityError } from '../errors';
import { isSentiment } from '../sentiment';
import type { Review, ReviewRow } from './types';

export function mapReviewRow(row: ReviewRow): Review {
  const id = typeof row.id === 'number' ? row.id : Number(row.id);
  if (!Number.isSafeInteger(id)) {
    throw new ReviewStoreIntegrityError(`Review row has a non-integer id: ${String(row.id)}`);
  }

  if (!isSentiment(row.sentiment)) {
    throw new ReviewStoreIntegrityError(
      `Review ${id} has an unknown sentiment value: ${row.sentiment}`,
    );
  }

  return {
    id,
    text: row.text,
    sentiment: row.sentiment,
    createdAt: coerceTimestamp(row.created_at),
  };
}

export function mapReviewRows(rows: readonly ReviewRow[]): Review[] {
  return rows.map(mapReviewRow);
}

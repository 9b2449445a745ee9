import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { Pool } from 'pg';
import { createLogger } from '@/common/utils/logger';
import type {
  InsertReviewInput,
  ListReviewsFilter,
  ReviewsRepositoryPort,
} from '../../application/ports/reviews-repository.port';
import { PG_POOL } from '../../application/ports/tokens';
import { ReviewStoreIntegrityError } from '../../domain/errors';
import { mapReviewRow, mapReviewRows, type Review, type ReviewRow } from '../../domain/review';

export const CREATE_REVIEWS_TABLE_SQL = `CREATE TABLE IF NOT EXISTS reviews (
  id SERIAL PRIMARY KEY,
  text TEXT NOT NULL,
  sentiment TEXT NOT NULL,
  created_at TIMESTAMP NOT NULL
)`;

const REVIEW_COLUMNS = 'id, text, sentiment, created_at';

@Injectable()
export class PgReviewsRepository implements ReviewsRepositoryPort, OnModuleInit {
  private readonly logger = createLogger(PgReviewsRepository.name);

  constructor(@Inject(PG_POOL) private readonly pool: Pool) {}

  async onModuleInit(): Promise<void> {
    await this.ensureSchema();
  }

  async ensureSchema(): Promise<void> {
    const client = await this.pool.connect();

    try {
      await client.query(CREATE_REVIEWS_TABLE_SQL);
    } finally {
      client.release();
    }

    this.logger.db('reviews_schema_ready', { event: 'reviews_schema_ready' });
  }

  async insertReview(input: InsertReviewInput): Promise<Review> {
    const client = await this.pool.connect();

    try {
      const inserted = await client.query<{ id: number }>(
        `INSERT INTO reviews (text, sentiment, created_at)
         VALUES ($1, $2, $3)
         RETURNING id`,
        [input.text, input.sentiment, input.createdAt],
      );

      const insertedId = inserted.rows[0]?.id;
      if (insertedId === undefined) {
        throw new ReviewStoreIntegrityError('Insert into reviews returned no id');
      }

      const readBack = await client.query<ReviewRow>(
        `SELECT ${REVIEW_COLUMNS}
         FROM reviews
         WHERE id = $1`,
        [insertedId],
      );

      const row = readBack.rows[0];
      if (!row) {
        throw new ReviewStoreIntegrityError(`Review ${insertedId} not found after insert`);
      }

      return mapReviewRow(row);
    } finally {
      client.release();
    }
  }

  async listReviews(filter: ListReviewsFilter): Promise<Review[]> {
    const client = await this.pool.connect();

    try {
      const result =
        filter.sentiment !== undefined
          ? await client.query<ReviewRow>(
              `SELECT ${REVIEW_COLUMNS}
               FROM reviews
               WHERE sentiment = $1
               ORDER BY created_at DESC, id DESC`,
              [filter.sentiment],
            )
          : await client.query<ReviewRow>(
              `SELECT ${REVIEW_COLUMNS}
               FROM reviews
               ORDER BY created_at DESC, id DESC`,
            );

      return mapReviewRows(result.rows);
    } finally {
      client.release();
    }
  }
}

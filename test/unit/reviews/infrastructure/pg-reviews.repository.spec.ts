import type { Pool } from 'pg';
import { ReviewStoreIntegrityError } from '@/modules/reviews/domain/errors';
import {
  CREATE_REVIEWS_TABLE_SQL,
  PgReviewsRepository,
} from '@/modules/reviews/infrastructure/repositories/pg-reviews.repository';

describe('PgReviewsRepository', () => {
  function buildSubject(): {
    repository: PgReviewsRepository;
    client: { query: jest.Mock; release: jest.Mock };
    pool: { connect: jest.Mock };
  } {
    const client = {
      query: jest.fn(),
      release: jest.fn(),
    };
    const pool = {
      connect: jest.fn().mockResolvedValue(client),
    };

    return {
      repository: new PgReviewsRepository(pool as unknown as Pool),
      client,
      pool,
    };
  }

  it('creates the reviews table when missing', async () => {
    const { repository, client } = buildSubject();
    client.query.mockResolvedValue({ rows: [] });

    await repository.ensureSchema();

    expect(client.query).toHaveBeenCalledWith(CREATE_REVIEWS_TABLE_SQL);
    expect(CREATE_REVIEWS_TABLE_SQL).toContain('CREATE TABLE IF NOT EXISTS reviews');
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('inserts and reads the row back on the same connection', async () => {
    const { repository, client, pool } = buildSubject();
    const createdAt = new Date('2026-03-01T10:00:00.000Z');
    client.query
      .mockResolvedValueOnce({ rows: [{ id: 42 }] })
      .mockResolvedValueOnce({
        rows: [{ id: 42, text: 'я люблю этот продукт', sentiment: 'positive', created_at: createdAt }],
      });

    const review = await repository.insertReview({
      text: 'я люблю этот продукт',
      sentiment: 'positive',
      createdAt,
    });

    expect(review).toEqual({
      id: 42,
      text: 'я люблю этот продукт',
      sentiment: 'positive',
      createdAt: '2026-03-01T10:00:00.000Z',
    });
    expect(pool.connect).toHaveBeenCalledTimes(1);
    expect(client.query).toHaveBeenNthCalledWith(
      1,
      expect.stringContaining('INSERT INTO reviews (text, sentiment, created_at)'),
      ['я люблю этот продукт', 'positive', createdAt],
    );
    expect(client.query).toHaveBeenNthCalledWith(2, expect.stringContaining('WHERE id = $1'), [42]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('fails with an integrity error when the inserted row cannot be read back', async () => {
    const { repository, client } = buildSubject();
    client.query.mockResolvedValueOnce({ rows: [{ id: 9 }] }).mockResolvedValueOnce({ rows: [] });

    await expect(
      repository.insertReview({ text: 'x', sentiment: 'neutral', createdAt: new Date() }),
    ).rejects.toThrow(new ReviewStoreIntegrityError('Review 9 not found after insert'));
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('releases the connection when the insert fails', async () => {
    const { repository, client } = buildSubject();
    const storeError = new Error('relation "reviews" does not exist');
    client.query.mockRejectedValueOnce(storeError);

    await expect(
      repository.insertReview({ text: 'x', sentiment: 'neutral', createdAt: new Date() }),
    ).rejects.toBe(storeError);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('filters by the literal sentiment value, most recent first', async () => {
    const { repository, client } = buildSubject();
    client.query.mockResolvedValueOnce({ rows: [] });

    await expect(repository.listReviews({ sentiment: 'unknown' })).resolves.toEqual([]);

    expect(client.query).toHaveBeenCalledWith(
      expect.stringMatching(/WHERE sentiment = \$1\s+ORDER BY created_at DESC, id DESC/),
      ['unknown'],
    );
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('lists every row without a filter', async () => {
    const { repository, client } = buildSubject();
    client.query.mockResolvedValueOnce({
      rows: [
        { id: 2, text: 'b', sentiment: 'negative', created_at: new Date('2026-03-02T00:00:00.000Z') },
        { id: 1, text: 'a', sentiment: 'positive', created_at: new Date('2026-03-01T00:00:00.000Z') },
      ],
    });

    const reviews = await repository.listReviews({});

    expect(reviews.map((review) => review.id)).toEqual([2, 1]);
    expect(client.query).toHaveBeenCalledTimes(1);
    expect(client.query.mock.calls[0]).toHaveLength(1);
    expect(client.query.mock.calls[0][0]).not.toContain('WHERE');
  });
});

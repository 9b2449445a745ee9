import { buildCorsOriginHandler, normalizeOrigin, resolveCorsMode } from '@/common/http/cors-policy';

function check(
  handler: ReturnType<typeof buildCorsOriginHandler>,
  origin: string | undefined,
): { error: Error | null; allow?: boolean } {
  let outcome: { error: Error | null; allow?: boolean } = { error: null };
  handler(origin, (error, allow) => {
    outcome = { error, allow };
  });
  return outcome;
}

describe('cors-policy', () => {
  it('normalizes origins to scheme and host', () => {
    expect(normalizeOrigin('https://Reviews.Example.com/path')).toBe('https://reviews.example.com');
    expect(normalizeOrigin('reviews.example.com/')).toBe('reviews.example.com');
  });

  it('is permissive outside production', () => {
    const handler = buildCorsOriginHandler({ NODE_ENV: 'development', ALLOWED_ORIGINS: [] });

    expect(resolveCorsMode({ NODE_ENV: 'test' })).toBe('development_permissive');
    expect(check(handler, 'https://anything.example.org')).toEqual({ error: null, allow: true });
  });

  it('allows listed origins in production', () => {
    const handler = buildCorsOriginHandler({
      NODE_ENV: 'production',
      ALLOWED_ORIGINS: ['https://reviews.example.com/'],
    });

    expect(check(handler, 'https://REVIEWS.example.com')).toEqual({ error: null, allow: true });
    expect(check(handler, undefined)).toEqual({ error: null, allow: true });
  });

  it('rejects unlisted origins in production', () => {
    const handler = buildCorsOriginHandler({
      NODE_ENV: 'production',
      ALLOWED_ORIGINS: ['https://reviews.example.com'],
    });

    const outcome = check(handler, 'https://evil.example.org');
    expect(outcome.error).toEqual(new Error('Origin not allowed by CORS'));
    expect(outcome.allow).toBeUndefined();
  });
});

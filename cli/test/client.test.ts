import { z } from 'zod';
import { ApiError, NotLoggedInError, toQueryString } from '../src/client.js';
import { userSchema } from '../src/schemas.js';
import { TEST_USER, createTestContext, session } from './helpers/testContext.js';

describe('toQueryString', () => {
  it('skips undefined and empty values', () => {
    expect(toQueryString({ name: 'Ana Diaz', limit: 50, gender: undefined, state: '', tech_only: true })).toBe(
      '?name=Ana+Diaz&limit=50&tech_only=true',
    );
    expect(toQueryString({})).toBe('');
  });
});

describe('ApiClient', () => {
  it('sends the stored access token and validates the response', async () => {
    const { ctx, requests } = await createTestContext(() => ({ status: 200, body: TEST_USER }));

    const user = await ctx.client.get('/api/v1/auth/me', userSchema);

    expect(user.email).toBe('coach@example.com');
    expect(requests).toHaveLength(1);
    expect(requests[0]?.authorization).toBe('Bearer access-1');
  });

  it('refreshes an expired token once and retries', async () => {
    const { ctx, requests, credentials } = await createTestContext((request) => {
      if (request.path === '/api/v1/auth/refresh') {
        return { status: 200, body: session('access-2', 'refresh-2') };
      }
      if (request.authorization === 'Bearer access-2') {
        return { status: 200, body: TEST_USER };
      }
      return { status: 401, body: { error: 'Invalid or expired token' } };
    });

    const user = await ctx.client.get('/api/v1/auth/me', userSchema);

    expect(user.id).toBe('users_1');
    expect(requests.map((request) => `${request.method} ${request.path}`)).toEqual([
      'GET /api/v1/auth/me',
      'POST /api/v1/auth/refresh',
      'GET /api/v1/auth/me',
    ]);
    expect(requests[1]?.body).toEqual({ refresh_token: 'refresh-1' });
    expect(requests[1]?.authorization).toBeNull();

    const stored = await credentials.load();
    expect(stored?.accessToken).toBe('access-2');
    expect(stored?.refreshToken).toBe('refresh-2');
    expect(stored?.email).toBe('coach@example.com');
  });

  it('surfaces the original 401 when the refresh fails', async () => {
    const { ctx, requests } = await createTestContext((request) =>
      request.path === '/api/v1/auth/refresh'
        ? { status: 401, body: { error: 'Session revoked' } }
        : { status: 401, body: { error: 'Invalid or expired token' } },
    );

    await expect(ctx.client.get('/api/v1/auth/me', userSchema)).rejects.toEqual(
      new ApiError(401, 'Invalid or expired token'),
    );
    expect(requests).toHaveLength(2);
  });

  it('reads the error message from the response body', async () => {
    const { ctx } = await createTestContext(() => ({ status: 409, body: { error: "A team named 'Lakeside' already exists" } }));

    const error = await ctx.client.post('/api/v1/teams', z.unknown(), { name: 'Lakeside' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ status: 409, message: "A team named 'Lakeside' already exists" });
  });

  it('accepts an empty 204 response', async () => {
    const { ctx, requests } = await createTestContext(() => ({ status: 204 }));

    await ctx.client.delete('/api/v1/teams/teams_1');

    expect(requests[0]?.method).toBe('DELETE');
    expect(requests[0]?.body).toBeUndefined();
  });

  it('refuses authenticated calls without credentials', async () => {
    const { ctx, requests } = await createTestContext(() => ({ status: 200, body: [] }), { loggedIn: false });

    await expect(ctx.client.get('/api/v1/teams', z.array(z.unknown()))).rejects.toBeInstanceOf(NotLoggedInError);
    expect(requests).toHaveLength(0);
  });
});

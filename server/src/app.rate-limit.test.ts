import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';

vi.mock('./config', async () => {
  const actual = await vi.importActual<typeof import('./config')>('./config');
  return { default: { ...actual.default, enableRateLimit: true } };
});

describe('app rate limits', () => {
  it('applies the general limit to the API and a tighter one to auth', async () => {
    const app = (await import('./app')).default;

    const health = await request(app).get('/api/v1/health');
    expect(health.statusCode).toBe(200);
    expect(health.headers['ratelimit-limit']).toBe('300');

    const login = () => request(app).post('/api/v1/auth/login/access-token').send({});
    const first = await login();
    expect(first.statusCode).toBe(400);
    expect(first.headers['ratelimit-limit']).toBe('20');
    expect(first.headers['ratelimit-remaining']).toBe('19');

    for (let i = 1; i < 20; i += 1) {
      await login();
    }
    expect((await login()).statusCode).toBe(429);
  });
});

import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import app from '../../app';
import { memoryApiKeyRepository, resetMemoryRepositories } from '../../test/memoryRepositories';
import { bearer, createTestUser } from '../../test/authHelpers';
import { hashApiKey } from './apiKey.crypto';

vi.mock('../user/user.repository', async () => {
  const m = await import('../../test/memoryRepositories');
  return { userRepository: m.memoryUserRepository };
});
vi.mock('./apiKey.repository', async () => {
  const m = await import('../../test/memoryRepositories');
  return { apiKeyRepository: m.memoryApiKeyRepository };
});
vi.mock('../voice/voice.repository', async () => {
  const m = await import('../../test/memoryRepositories');
  return { voiceRepository: m.memoryVoiceRepository };
});

describe('API Key Routes', () => {
  beforeEach(() => {
    resetMemoryRepositories();
  });

  describe('POST /api/v1/api-keys', () => {
    it('returns the raw key once and stores only its hash', async () => {
      const { user, token } = await createTestUser('keys@example.com');

      const res = await request(app)
        .post('/api/v1/api-keys')
        .set('Authorization', bearer(token))
        .send({ name: 'ci' });

      expect(res.statusCode).toBe(201);
      expect(res.body).toEqual({
        id: expect.any(String),
        name: 'ci',
        is_active: true,
        expires_at: null,
        created_at: expect.any(String),
        last_used_at: null,
        prefix: res.body.key.slice(0, 8),
        key: expect.stringMatching(/^sk_[A-Za-z0-9_-]{43}$/),
      });

      const [stored] = memoryApiKeyRepository.apiKeys;
      expect(stored?.userId).toBe(user.id);
      expect(stored?.keyHash).toBe(hashApiKey(res.body.key));
    });

    it('accepts an ISO expiry', async () => {
      const { token } = await createTestUser('keys@example.com');

      const res = await request(app)
        .post('/api/v1/api-keys')
        .set('Authorization', bearer(token))
        .send({ name: 'temp', expires_at: '2099-01-01T00:00:00.000Z' });

      expect(res.statusCode).toBe(201);
      expect(res.body.expires_at).toBe('2099-01-01T00:00:00.000Z');
    });

    it('requires a name', async () => {
      const { token } = await createTestUser('keys@example.com');

      const res = await request(app).post('/api/v1/api-keys').set('Authorization', bearer(token)).send({ name: ' ' });

      expect(res.statusCode).toBe(400);
      expect(res.body.message).toBe('Name is required');
    });

    it('cannot be reached with an API key', async () => {
      const { token } = await createTestUser('keys@example.com');
      const created = await request(app).post('/api/v1/api-keys').set('Authorization', bearer(token)).send({ name: 'a' });

      const res = await request(app).post('/api/v1/api-keys').set('X-API-Key', created.body.key).send({ name: 'b' });

      expect(res.statusCode).toBe(401);
    });
  });

  describe('GET /api/v1/api-keys', () => {
    it('lists only the caller keys and never the raw key', async () => {
      const alice = await createTestUser('alice@example.com');
      const bob = await createTestUser('bob@example.com');
      await request(app).post('/api/v1/api-keys').set('Authorization', bearer(alice.token)).send({ name: 'alice-1' });
      await request(app).post('/api/v1/api-keys').set('Authorization', bearer(bob.token)).send({ name: 'bob-1' });

      const res = await request(app).get('/api/v1/api-keys').set('Authorization', bearer(alice.token));

      expect(res.statusCode).toBe(200);
      expect(res.body).toHaveLength(1);
      expect(res.body[0].name).toBe('alice-1');
      expect(res.body[0]).not.toHaveProperty('key');
    });
  });

  describe('DELETE /api/v1/api-keys/:apiKeyId', () => {
    it('deletes an own key', async () => {
      const { token } = await createTestUser('keys@example.com');
      const created = await request(app).post('/api/v1/api-keys').set('Authorization', bearer(token)).send({ name: 'a' });

      const res = await request(app).delete(`/api/v1/api-keys/${created.body.id}`).set('Authorization', bearer(token));

      expect(res.statusCode).toBe(204);
      expect(memoryApiKeyRepository.apiKeys).toHaveLength(0);
    });

    it("returns 404 for another user's key", async () => {
      const alice = await createTestUser('alice@example.com');
      const bob = await createTestUser('bob@example.com');
      const created = await request(app)
        .post('/api/v1/api-keys')
        .set('Authorization', bearer(alice.token))
        .send({ name: 'a' });

      const res = await request(app)
        .delete(`/api/v1/api-keys/${created.body.id}`)
        .set('Authorization', bearer(bob.token));

      expect(res.statusCode).toBe(404);
      expect(res.body).toEqual({ message: 'API key not found' });
      expect(memoryApiKeyRepository.apiKeys).toHaveLength(1);
    });
  });

  describe('GET /api/v1/api-keys/check/:apiKey', () => {
    it('is superuser only', async () => {
      const { token } = await createTestUser('keys@example.com');

      const res = await request(app).get('/api/v1/api-keys/check/sk_whatever').set('Authorization', bearer(token));

      expect(res.statusCode).toBe(403);
    });

    it('describes a known key', async () => {
      const owner = await createTestUser('owner@example.com');
      const root = await createTestUser('root@example.com', { isSuperuser: true });
      const created = await request(app)
        .post('/api/v1/api-keys')
        .set('Authorization', bearer(owner.token))
        .send({ name: 'a' });
      const keyHash = hashApiKey(created.body.key);

      const res = await request(app)
        .get(`/api/v1/api-keys/check/${created.body.key}`)
        .set('Authorization', bearer(root.token));

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({
        status: 'found',
        is_active: true,
        expires_at: null,
        user_email: 'owner@example.com',
        user_active: true,
        hashed_key_prefix: keyHash.slice(0, 8),
        stored_key_prefix: keyHash.slice(0, 8),
      });
    });

    it('reports an unknown key', async () => {
      const root = await createTestUser('root@example.com', { isSuperuser: true });

      const res = await request(app).get('/api/v1/api-keys/check/sk_unknown').set('Authorization', bearer(root.token));

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({
        status: 'not_found',
        message: 'API key not found in database',
        hashed_key_prefix: hashApiKey('sk_unknown').slice(0, 8),
      });
    });
  });

  describe('X-API-Key authentication', () => {
    it('authenticates API-key routes and records the use', async () => {
      const { token } = await createTestUser('keys@example.com');
      const created = await request(app).post('/api/v1/api-keys').set('Authorization', bearer(token)).send({ name: 'a' });

      const res = await request(app).get('/api/v1/voices').set('X-API-Key', created.body.key);

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual([]);
      expect(memoryApiKeyRepository.apiKeys[0]?.lastUsedAt).toBeInstanceOf(Date);
    });

    it('rejects an inactive key', async () => {
      const { token } = await createTestUser('keys@example.com');
      const created = await request(app)
        .post('/api/v1/api-keys')
        .set('Authorization', bearer(token))
        .send({ name: 'off', is_active: false });

      const res = await request(app).get('/api/v1/voices').set('X-API-Key', created.body.key);

      expect(res.statusCode).toBe(401);
      expect(res.body).toEqual({ message: 'Could not validate credentials' });
    });

    it('rejects an expired key', async () => {
      const { token } = await createTestUser('keys@example.com');
      const created = await request(app)
        .post('/api/v1/api-keys')
        .set('Authorization', bearer(token))
        .send({ name: 'old', expires_at: '2000-01-01T00:00:00.000Z' });

      const res = await request(app).get('/api/v1/voices').set('X-API-Key', created.body.key);

      expect(res.statusCode).toBe(401);
    });

    it('rejects a key whose owner was deactivated', async () => {
      const { user, token } = await createTestUser('keys@example.com');
      const created = await request(app).post('/api/v1/api-keys').set('Authorization', bearer(token)).send({ name: 'a' });
      const { memoryUserRepository } = await import('../../test/memoryRepositories');
      await memoryUserRepository.updateById(user.id, { isActive: false });

      const res = await request(app).get('/api/v1/voices').set('X-API-Key', created.body.key);

      expect(res.statusCode).toBe(401);
    });
  });
});

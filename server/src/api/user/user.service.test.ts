import { describe, it, expect, vi, beforeEach } from 'vitest';
import { memoryUserRepository, resetMemoryRepositories } from '../../test/memoryRepositories';
import { verifyPassword } from '../auth/auth.service';
import userService from './user.service';

vi.mock('./user.repository', async () => {
  const m = await import('../../test/memoryRepositories');
  return { userRepository: m.memoryUserRepository };
});

describe('api/user/user.service ensureFirstSuperuser', () => {
  beforeEach(() => {
    resetMemoryRepositories();
  });

  it('creates the configured superuser once', async () => {
    expect(await userService.ensureFirstSuperuser()).toBe(true);
    expect(await userService.ensureFirstSuperuser()).toBe(false);

    expect(memoryUserRepository.users).toHaveLength(1);
    const [admin] = memoryUserRepository.users;
    expect(admin).toMatchObject({ email: 'admin@example.com', isSuperuser: true, isActive: true });
    expect(await verifyPassword('test-admin-password', admin?.hashedPassword ?? '')).toBe(true);
  });

  it('leaves an existing account with that email untouched', async () => {
    await memoryUserRepository.create({ email: 'admin@example.com', hashedPassword: 'x', isSuperuser: false });

    expect(await userService.ensureFirstSuperuser()).toBe(false);
    expect(memoryUserRepository.users[0]?.isSuperuser).toBe(false);
  });

  it('treats losing a seeding race as already seeded', async () => {
    vi.spyOn(memoryUserRepository, 'create').mockRejectedValueOnce(
      Object.assign(new Error('E11000'), { name: 'MongoServerError', code: 11000 })
    );

    expect(await userService.ensureFirstSuperuser()).toBe(false);
  });
});

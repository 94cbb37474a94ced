import { InMemoryUsersRepository } from '../in-memory-users.repository';
import { DuplicateEmailError } from '../users.repository';

describe('InMemoryUsersRepository', () => {
  let repository: InMemoryUsersRepository;

  const alice = {
    email: 'Alice@Example.com',
    name: 'Alice',
    passwordHash: 'hash',
    isAdmin: false,
  };

  beforeEach(() => {
    repository = new InMemoryUsersRepository();
  });

  it('should assign sequential ids and normalize emails', async () => {
    const first = await repository.create(alice);
    const second = await repository.create({ ...alice, email: 'bob@example.com' });

    expect(first.id).toBe('1');
    expect(first.email).toBe('alice@example.com');
    expect(second.id).toBe('2');
  });

  it('should find users by email regardless of case', async () => {
    await repository.create(alice);

    const found = await repository.findByEmail('ALICE@example.COM');

    expect(found?.name).toBe('Alice');
  });

  it('should reject a duplicate email', async () => {
    await repository.create(alice);

    await expect(repository.create(alice)).rejects.toBeInstanceOf(
      DuplicateEmailError,
    );
  });

  it('should hide soft-deleted users from lookups', async () => {
    const user = await repository.create(alice);

    expect(await repository.softDelete(user.id)).toBe(true);

    expect(await repository.findById(user.id)).toBeNull();
    expect(await repository.findByEmail(alice.email)).toBeNull();
    expect(await repository.update(user.id, { name: 'Changed' })).toBeNull();
    expect(await repository.softDelete(user.id)).toBe(false);
  });

  it('should apply profile changes', async () => {
    const user = await repository.create(alice);

    const updated = await repository.update(user.id, { name: 'Alice Updated' });

    expect(updated?.name).toBe('Alice Updated');
    expect((await repository.findById(user.id))?.name).toBe('Alice Updated');
  });
});

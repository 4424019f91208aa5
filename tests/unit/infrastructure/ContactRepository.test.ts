import { describe, it, expect, beforeEach } from 'vitest';
import { initDatabase, type DatabaseConnection } from '../../../src/infrastructure/database/lowdb/connection.js';
import { ContactRepository } from '../../../src/infrastructure/database/lowdb/ContactRepository.js';
import type { ContactData } from '../../../src/domain/contact/types.js';
import { UniqueConstraintError } from '../../../src/utils/errors.js';

const A = { id: 1 };
const B = { id: 2 };

function contact(overrides: Partial<ContactData> = {}): ContactData {
  return {
    name: 'Ann',
    surname: 'Lee',
    email: 'ann@example.com',
    phone: '5550001',
    birthday: '1990-01-03',
    ...overrides,
  };
}

describe('ContactRepository', () => {
  let db: DatabaseConnection;
  let contacts: ContactRepository;

  beforeEach(async () => {
    db = await initDatabase({ inMemory: true });
    contacts = new ContactRepository(db);
  });

  it('creates a contact owned by the caller with info defaulting to null', async () => {
    const created = await contacts.create(contact(), A);
    expect(created).toMatchObject({ id: 1, userId: 1, name: 'Ann', info: null });
  });

  it('lets two owners hold identical contacts but not one owner twice', async () => {
    await contacts.create(contact(), A);
    await expect(contacts.create(contact(), B)).resolves.toMatchObject({ userId: 2 });

    const byEmail = await contacts.create(contact({ phone: '5559999' }), A).catch((e: unknown) => e);
    expect(byEmail).toBeInstanceOf(UniqueConstraintError);
    expect(byEmail).toMatchObject({ field: 'email' });
    await expect(contacts.create(contact({ email: 'x@example.com' }), A)).rejects.toMatchObject({ field: 'phone' });
  });

  it('hides other owners contacts', async () => {
    const mine = await contacts.create(contact(), A);

    expect(await contacts.getById(mine.id, B)).toBeNull();
    expect(await contacts.update(mine.id, { name: 'Eve' }, B)).toBeNull();
    expect(await contacts.remove(mine.id, B)).toBeNull();
    expect(await contacts.search({}, { skip: 0, limit: 100 }, B)).toEqual([]);
    expect((await contacts.getById(mine.id, A))?.name).toBe('Ann');
  });

  it('checks existence by email or phone, optionally excluding one id', async () => {
    const ann = await contacts.create(contact(), A);

    expect(await contacts.exists('ANN@example.com', '000', A)).toBe(true);
    expect(await contacts.exists('zz@example.com', '5550001', A)).toBe(true);
    expect(await contacts.exists('zz@example.com', '000', A)).toBe(false);
    expect(await contacts.exists('ann@example.com', '5550001', A, ann.id)).toBe(false);
    expect(await contacts.exists('ann@example.com', '5550001', B)).toBe(false);
  });

  it('searches by case-insensitive substrings with pagination ordered by id', async () => {
    await contacts.create(contact({ name: 'Ann', surname: 'Lee', email: 'ann@example.com', phone: '1111111' }), A);
    await contacts.create(contact({ name: 'Joanna', surname: 'Smith', email: 'jo@mail.org', phone: '2222222' }), A);
    await contacts.create(contact({ name: 'Bob', surname: 'Leeds', email: 'bob@example.com', phone: '3333333' }), A);

    const byName = await contacts.search({ name: 'ANN' }, { skip: 0, limit: 100 }, A);
    expect(byName.map((c) => c.name)).toEqual(['Ann', 'Joanna']);

    const combined = await contacts.search({ surname: 'lee', email: 'example' }, { skip: 0, limit: 100 }, A);
    expect(combined.map((c) => c.name)).toEqual(['Ann', 'Bob']);

    const page = await contacts.search({}, { skip: 1, limit: 1 }, A);
    expect(page.map((c) => c.id)).toEqual([2]);
  });

  it('applies partial updates and rejects collisions', async () => {
    const ann = await contacts.create(contact(), A);
    await contacts.create(contact({ email: 'bob@example.com', phone: '5550002' }), A);

    const updated = await contacts.update(ann.id, { surname: 'Park', info: 'met at work' }, A);
    expect(updated).toMatchObject({ name: 'Ann', surname: 'Park', email: 'ann@example.com', info: 'met at work' });

    await expect(contacts.update(ann.id, { phone: '5550002' }, A)).rejects.toBeInstanceOf(UniqueConstraintError);
    // keeping its own email/phone is not a collision
    await expect(contacts.update(ann.id, { email: 'ann@example.com' }, A)).resolves.not.toBeNull();
  });

  it('removes and returns the contact', async () => {
    const ann = await contacts.create(contact(), A);
    expect((await contacts.remove(ann.id, A))?.id).toBe(ann.id);
    expect(await contacts.getById(ann.id, A)).toBeNull();
  });

  it('lists upcoming birthdays for the owner only', async () => {
    await contacts.create(contact({ email: 'jan@x.io', phone: '1000001', birthday: '1990-01-03' }), A);
    await contacts.create(contact({ email: 'dec@x.io', phone: '1000002', birthday: '1990-12-20' }), A);
    await contacts.create(contact({ email: 'b@x.io', phone: '1000003', birthday: '1990-12-29' }), B);

    const upcoming = await contacts.upcomingBirthdays(10, A, new Date(2024, 11, 28));
    expect(upcoming.map((c) => c.email)).toEqual(['jan@x.io']);
  });

  it('rolls the document back when an update throws', async () => {
    await contacts.create(contact(), A);
    const version = db.getVersion();

    await expect(
      db.atomicUpdate((data) => {
        data.contacts.length = 0;
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(db.getData().contacts).toHaveLength(1);
    expect(db.getVersion()).toBe(version);
  });
});

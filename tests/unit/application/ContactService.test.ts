import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ContactService } from '../../../src/application/contacts/ContactService.js';
import { initDatabase } from '../../../src/infrastructure/database/lowdb/connection.js';
import { ContactRepository } from '../../../src/infrastructure/database/lowdb/ContactRepository.js';
import { ConflictError, UniqueConstraintError } from '../../../src/utils/errors.js';

const owner = { id: 7 };
const ann = {
  name: 'Ann',
  surname: 'Lee',
  email: 'ann@example.com',
  phone: '5550001',
  birthday: '1990-01-03',
};

describe('ContactService', () => {
  let repo: ContactRepository;
  let service: ContactService;

  beforeEach(async () => {
    repo = new ContactRepository(await initDatabase({ inMemory: true }));
    service = new ContactService(repo);
  });

  it('names the email and phone in the conflict message', async () => {
    await service.createContact(ann, owner);

    await expect(service.createContact({ ...ann, phone: '5550009' }, owner)).rejects.toThrow(
      "Contact with 'ann@example.com' email or '5550009' phone number already exists."
    );
  });

  it('maps a late uniqueness violation from storage to ConflictError', async () => {
    vi.spyOn(repo, 'exists').mockResolvedValueOnce(false);
    vi.spyOn(repo, 'create').mockRejectedValueOnce(new UniqueConstraintError('email', ann.email));

    await expect(service.createContact(ann, owner)).rejects.toBeInstanceOf(ConflictError);
  });

  it('rejects an update that collides with another contact of the owner', async () => {
    const first = await service.createContact(ann, owner);
    await service.createContact({ ...ann, email: 'bob@example.com', phone: '5550002' }, owner);

    await expect(service.updateContact(first.id, { email: 'bob@example.com' }, owner)).rejects.toThrow(
      "Contact with 'bob@example.com' email or '5550001' phone number already exists."
    );
  });

  it('returns null for missing contacts', async () => {
    expect(await service.getContact(99, owner)).toBeNull();
    expect(await service.updateContact(99, { name: 'Zed' }, owner)).toBeNull();
    expect(await service.removeContact(99, owner)).toBeNull();
  });

  it('passes search and birthdays through with the owner', async () => {
    await service.createContact(ann, owner);

    expect(await service.getContacts({ name: 'an' }, { skip: 0, limit: 10 }, owner)).toHaveLength(1);
    expect(await service.getContacts({}, { skip: 0, limit: 10 }, { id: 8 })).toHaveLength(0);
    expect(await service.getUpcomingBirthdays(7, owner, new Date(2024, 11, 30))).toHaveLength(1);
  });
});

// Contact Repository - LowDB implementation
// Every query filters on user_id; email and phone are unique per owner

import { DatabaseConnection, type ContactRecord, type DatabaseSchema } from './connection.js';
import type { Contact, ContactData, ContactFilter, ContactPatch, Pagination } from '@/domain/contact/types.js';
import type { ContactOwner, IContactRepository } from '@/domain/contact/repository.js';
import { selectUpcomingBirthdays } from '@/domain/contact/birthdays.js';
import { UniqueConstraintError } from '@/utils/errors.js';

function includesText(value: string, fragment: string | undefined): boolean {
  if (!fragment) return true;
  return value.toLowerCase().includes(fragment.toLowerCase());
}

function ownedBy(store: DatabaseSchema, owner: ContactOwner): ContactRecord[] {
  return store.contacts.filter((c) => c.user_id === owner.id);
}

/**
 * Throws UniqueConstraintError when another contact of the owner already uses the email or phone
 */
function assertUnique(
  store: DatabaseSchema,
  owner: ContactOwner,
  email: string,
  phone: string,
  excludeId?: number
): void {
  for (const contact of ownedBy(store, owner)) {
    if (contact.id === excludeId) continue;
    if (contact.email.toLowerCase() === email.toLowerCase()) {
      throw new UniqueConstraintError('email', email);
    }
    if (contact.phone === phone) {
      throw new UniqueConstraintError('phone', phone);
    }
  }
}

export class ContactRepository implements IContactRepository {
  constructor(private db: DatabaseConnection) {}

  /**
   * List the owner's contacts, filtered by substrings of name / surname / email
   */
  async search(filter: ContactFilter, page: Pagination, owner: ContactOwner): Promise<Contact[]> {
    return ownedBy(this.db.getData(), owner)
      .filter(
        (c) =>
          includesText(c.name, filter.name) &&
          includesText(c.surname, filter.surname) &&
          includesText(c.email, filter.email)
      )
      .sort((a, b) => a.id - b.id)
      .slice(page.skip, page.skip + page.limit)
      .map((c) => this.rowToContact(c));
  }

  async getById(id: number, owner: ContactOwner): Promise<Contact | null> {
    const contact = this.db.getData().contacts.find((c) => c.id === id && c.user_id === owner.id);
    return contact ? this.rowToContact(contact) : null;
  }

  /**
   * True when the owner already has a contact with this email OR this phone
   */
  async exists(email: string, phone: string, owner: ContactOwner, excludeId?: number): Promise<boolean> {
    return ownedBy(this.db.getData(), owner).some(
      (c) => c.id !== excludeId && (c.email.toLowerCase() === email.toLowerCase() || c.phone === phone)
    );
  }

  async create(data: ContactData, owner: ContactOwner): Promise<Contact> {
    const record = await this.db.atomicUpdate((store) => {
      assertUnique(store, owner, data.email, data.phone);

      const now = new Date().toISOString();
      const contact: ContactRecord = {
        id: DatabaseConnection.nextId(store, 'contacts'),
        user_id: owner.id,
        name: data.name,
        surname: data.surname,
        email: data.email,
        phone: data.phone,
        birthday: data.birthday,
        info: data.info ?? null,
        created_at: now,
        updated_at: now,
      };

      store.contacts.push(contact);
      return { ...contact };
    });

    return this.rowToContact(record);
  }

  /**
   * Partial update: only fields present in the patch are overwritten
   */
  async update(id: number, patch: ContactPatch, owner: ContactOwner): Promise<Contact | null> {
    const record = await this.db.atomicUpdate((store) => {
      const contact = store.contacts.find((c) => c.id === id && c.user_id === owner.id);
      if (!contact) return null;

      assertUnique(store, owner, patch.email ?? contact.email, patch.phone ?? contact.phone, contact.id);

      if (patch.name !== undefined) contact.name = patch.name;
      if (patch.surname !== undefined) contact.surname = patch.surname;
      if (patch.email !== undefined) contact.email = patch.email;
      if (patch.phone !== undefined) contact.phone = patch.phone;
      if (patch.birthday !== undefined) contact.birthday = patch.birthday;
      if (patch.info !== undefined) contact.info = patch.info;
      contact.updated_at = new Date().toISOString();

      return { ...contact };
    });

    return record ? this.rowToContact(record) : null;
  }

  async remove(id: number, owner: ContactOwner): Promise<Contact | null> {
    const record = await this.db.atomicUpdate((store) => {
      const idx = store.contacts.findIndex((c) => c.id === id && c.user_id === owner.id);
      if (idx === -1) return null;

      const [removed] = store.contacts.splice(idx, 1);
      return removed;
    });

    return record ? this.rowToContact(record) : null;
  }

  /**
   * Contacts whose birthday falls within the next `days` days (inclusive)
   */
  async upcomingBirthdays(days: number, owner: ContactOwner, today: Date = new Date()): Promise<Contact[]> {
    return selectUpcomingBirthdays(ownedBy(this.db.getData(), owner), days, today).map((c) =>
      this.rowToContact(c)
    );
  }

  private rowToContact(row: ContactRecord): Contact {
    return {
      id: row.id,
      userId: row.user_id,
      name: row.name,
      surname: row.surname,
      email: row.email,
      phone: row.phone,
      birthday: row.birthday,
      info: row.info,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}

// Application: Contact Service
// Owner-scoped contact operations; maps uniqueness violations to ConflictError

import type { Contact, ContactData, ContactFilter, ContactPatch, Pagination } from '@/domain/contact/types.js';
import type { ContactOwner, IContactRepository } from '@/domain/contact/repository.js';
import { ConflictError, UniqueConstraintError } from '@/utils/errors.js';
import { contactsLogger } from '@/utils/logger.js';

function duplicateContact(email: string, phone: string): ConflictError {
  return new ConflictError(`Contact with '${email}' email or '${phone}' phone number already exists.`);
}

export class ContactService {
  constructor(private contacts: IContactRepository) {}

  async getContacts(filter: ContactFilter, page: Pagination, owner: ContactOwner): Promise<Contact[]> {
    return this.contacts.search(filter, page, owner);
  }

  async getContact(id: number, owner: ContactOwner): Promise<Contact | null> {
    return this.contacts.getById(id, owner);
  }

  async createContact(data: ContactData, owner: ContactOwner): Promise<Contact> {
    if (await this.contacts.exists(data.email, data.phone, owner)) {
      throw duplicateContact(data.email, data.phone);
    }

    try {
      const contact = await this.contacts.create(data, owner);
      contactsLogger.info('Contact created', { contactId: contact.id, userId: owner.id });
      return contact;
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        throw duplicateContact(data.email, data.phone);
      }
      throw error;
    }
  }

  async updateContact(id: number, patch: ContactPatch, owner: ContactOwner): Promise<Contact | null> {
    try {
      const contact = await this.contacts.update(id, patch, owner);
      if (contact) {
        contactsLogger.info('Contact updated', { contactId: id, userId: owner.id });
      }
      return contact;
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        const current = await this.contacts.getById(id, owner);
        throw duplicateContact(patch.email ?? current?.email ?? '', patch.phone ?? current?.phone ?? '');
      }
      throw error;
    }
  }

  async removeContact(id: number, owner: ContactOwner): Promise<Contact | null> {
    const removed = await this.contacts.remove(id, owner);
    if (removed) {
      contactsLogger.info('Contact removed', { contactId: id, userId: owner.id });
    }
    return removed;
  }

  async getUpcomingBirthdays(days: number, owner: ContactOwner, today?: Date): Promise<Contact[]> {
    return this.contacts.upcomingBirthdays(days, owner, today);
  }
}

// Domain: Contact repository interface
// Every method is scoped to the owning user; there is no unscoped access path

import type { User } from '../user/types.js';
import type { Contact, ContactData, ContactFilter, ContactPatch, Pagination } from './types.js';

export type ContactOwner = Pick<User, 'id'>;

export interface IContactRepository {
  search(filter: ContactFilter, page: Pagination, owner: ContactOwner): Promise<Contact[]>;
  getById(id: number, owner: ContactOwner): Promise<Contact | null>;
  exists(email: string, phone: string, owner: ContactOwner, excludeId?: number): Promise<boolean>;
  create(data: ContactData, owner: ContactOwner): Promise<Contact>;
  update(id: number, patch: ContactPatch, owner: ContactOwner): Promise<Contact | null>;
  remove(id: number, owner: ContactOwner): Promise<Contact | null>;
  upcomingBirthdays(days: number, owner: ContactOwner, today?: Date): Promise<Contact[]>;
}

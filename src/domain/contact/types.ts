// Domain: Contact types

/**
 * A contact owned by exactly one user
 */
export interface Contact {
  id: number;
  userId: number;
  name: string;
  surname: string;
  email: string;
  phone: string;
  birthday: string;              // Calendar date, YYYY-MM-DD
  info: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ContactData {
  name: string;
  surname: string;
  email: string;
  phone: string;
  birthday: string;
  info?: string | null;
}

export type ContactPatch = Partial<ContactData>;

export interface ContactFilter {
  name?: string;
  surname?: string;
  email?: string;
}

export interface Pagination {
  skip: number;
  limit: number;
}

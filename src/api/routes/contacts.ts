// API layer: Contact routes
// Every handler passes the authenticated principal down; other users' contacts read as missing

import { Router, type Request, type Response } from 'express';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import { principalOf, type AuthModule } from '@/api/middleware/AuthModule.js';
import {
  BirthdayQuerySchema,
  ContactIdSchema,
  ContactPatchSchema,
  ContactQuerySchema,
  ContactSchema,
} from '@/api/schemas/index.js';
import type { ContactService } from '@/application/contacts/ContactService.js';
import type { Contact } from '@/domain/contact/types.js';
import { NotFoundError } from '@/utils/errors.js';

function found(contact: Contact | null): Contact {
  if (!contact) {
    throw new NotFoundError('Contact not found');
  }
  return contact;
}

export function createContactsRouter(contacts: ContactService, auth: AuthModule): Router {
  const router = Router();

  router.use(auth.requireAuth);

  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const { name, surname, email, skip, limit } = ContactQuerySchema.parse(req.query);
      const list = await contacts.getContacts({ name, surname, email }, { skip, limit }, principalOf(req));
      res.json({ success: true, contacts: list });
    })
  );

  // Registered before /:id so "birthdays" is never read as an id
  router.get(
    '/birthdays',
    asyncHandler(async (req: Request, res: Response) => {
      const { days } = BirthdayQuerySchema.parse(req.query);
      const list = await contacts.getUpcomingBirthdays(days, principalOf(req));
      res.json({ success: true, contacts: list });
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const { id } = ContactIdSchema.parse(req.params);
      res.json({ success: true, contact: found(await contacts.getContact(id, principalOf(req))) });
    })
  );

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const data = ContactSchema.parse(req.body);
      const contact = await contacts.createContact(data, principalOf(req));
      res.status(201).json({ success: true, contact });
    })
  );

  router.put(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const { id } = ContactIdSchema.parse(req.params);
      const data = ContactSchema.parse(req.body);
      const contact = await contacts.updateContact(id, { ...data, info: data.info ?? null }, principalOf(req));
      res.json({ success: true, contact: found(contact) });
    })
  );

  router.patch(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const { id } = ContactIdSchema.parse(req.params);
      const patch = ContactPatchSchema.parse(req.body);
      res.json({ success: true, contact: found(await contacts.updateContact(id, patch, principalOf(req))) });
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const { id } = ContactIdSchema.parse(req.params);
      res.json({ success: true, contact: found(await contacts.removeContact(id, principalOf(req))) });
    })
  );

  return router;
}

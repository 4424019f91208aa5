// API layer: request schemas (zod)

import { z } from 'zod';
import { parseCalendarDate } from '@/domain/contact/birthdays.js';

export const RegisterSchema = z.object({
  username: z.string().trim().min(3).max(30).regex(/^[^@\s]+$/, 'Username must not contain @ or spaces'),
  email: z.string().trim().email().max(100),
  password: z.string().min(4).max(128),
});

export const LoginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

export const RequestEmailSchema = z.object({
  email: z.string().trim().email(),
});

export const ResetPasswordSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(4).max(128),
});

export const TokenParamSchema = z.object({
  token: z.string().min(1),
});

const birthday = z
  .string()
  .refine((value) => parseCalendarDate(value) !== null, { message: 'Expected a calendar date (YYYY-MM-DD)' });

export const ContactSchema = z.object({
  name: z.string().trim().min(2).max(50),
  surname: z.string().trim().min(2).max(50),
  email: z.string().trim().email().max(100),
  phone: z.string().trim().min(7).max(20),
  birthday,
  info: z.string().max(500).nullable().optional(),
});

export const ContactPatchSchema = ContactSchema.partial();

export const ContactIdSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const ContactQuerySchema = z.object({
  name: z.string().optional(),
  surname: z.string().optional(),
  email: z.string().optional(),
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const BirthdayQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(366).default(7),
});

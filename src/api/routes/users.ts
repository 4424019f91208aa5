// API layer: Current user routes

import express, { Router, type Request, type Response } from 'express';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import { principalOf, type AuthModule } from '@/api/middleware/AuthModule.js';
import type { RateLimiters } from '@/api/app.js';
import type { AuthService } from '@/application/auth/AuthService.js';
import { toPublicUser } from '@/domain/user/types.js';
import { ValidationError } from '@/utils/errors.js';

export const MAX_AVATAR_BYTES = 5 * 1024 * 1024;

export function createUsersRouter(authService: AuthService, auth: AuthModule, limiters: RateLimiters): Router {
  const router = Router();

  router.use(auth.requireAuth);

  router.get('/me', limiters.me, (req: Request, res: Response) => {
    res.json({ success: true, user: toPublicUser(principalOf(req)) });
  });

  /**
   * PATCH /api/users/avatar (admin only)
   * Body is the raw image with an image/* content type
   */
  router.patch(
    '/avatar',
    auth.adminOnly,
    express.raw({ type: 'image/*', limit: MAX_AVATAR_BYTES }),
    asyncHandler(async (req: Request, res: Response) => {
      const contentType = req.headers['content-type'];
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0 || !contentType?.startsWith('image/')) {
        throw new ValidationError('An image body (image/*) is required');
      }

      const user = await authService.updateAvatar(principalOf(req), { body, contentType });
      res.json({ success: true, user });
    })
  );

  return router;
}

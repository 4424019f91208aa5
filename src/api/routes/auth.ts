// API layer: Authentication routes
// Registration, login, email confirmation and password reset

import { Router, type Request, type Response } from 'express';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import { ACCESS_TOKEN_COOKIE } from '@/api/middleware/AuthModule.js';
import type { RateLimiters } from '@/api/app.js';
import {
  LoginSchema,
  RegisterSchema,
  RequestEmailSchema,
  ResetPasswordSchema,
  TokenParamSchema,
} from '@/api/schemas/index.js';
import type { AuthService } from '@/application/auth/AuthService.js';

export function createAuthRouter(authService: AuthService, limiters: RateLimiters): Router {
  const router = Router();

  /**
   * POST /api/auth/register
   */
  router.post(
    '/register',
    limiters.register,
    asyncHandler(async (req: Request, res: Response) => {
      const data = RegisterSchema.parse(req.body);
      const user = await authService.register(data);
      res.status(201).json({ success: true, user });
    })
  );

  /**
   * POST /api/auth/login
   * Accepts JSON or form-encoded `username` / `password`
   */
  router.post(
    '/login',
    limiters.login,
    asyncHandler(async (req: Request, res: Response) => {
      const credentials = LoginSchema.parse(req.body);
      const token = await authService.login(credentials);

      res.cookie(ACCESS_TOKEN_COOKIE, token.accessToken, {
        httpOnly: true,
        secure: process.env.NODE_ENV === 'production',
        sameSite: 'strict',
        maxAge: token.expiresIn * 1000,
      });
      res.json({ success: true, ...token });
    })
  );

  router.get(
    '/confirmed_email/:token',
    asyncHandler(async (req: Request, res: Response) => {
      const { token } = TokenParamSchema.parse(req.params);
      res.json({ success: true, ...(await authService.confirmEmail(token)) });
    })
  );

  router.post(
    '/request_email',
    asyncHandler(async (req: Request, res: Response) => {
      const { email } = RequestEmailSchema.parse(req.body);
      res.json({ success: true, ...(await authService.requestConfirmationEmail(email)) });
    })
  );

  /**
   * POST /api/auth/reset_password
   * The new password travels (hashed) inside the mailed link
   */
  router.post(
    '/reset_password',
    limiters.resetPassword,
    asyncHandler(async (req: Request, res: Response) => {
      const { email, password } = ResetPasswordSchema.parse(req.body);
      res.json({ success: true, ...(await authService.requestPasswordReset(email, password)) });
    })
  );

  router.get(
    '/confirm_reset_password/:token',
    asyncHandler(async (req: Request, res: Response) => {
      const { token } = TokenParamSchema.parse(req.params);
      res.json({ success: true, ...(await authService.confirmPasswordReset(token)) });
    })
  );

  return router;
}

/**
 * Ready-made Express routes for password registration and login.
 *
 * @ai_context This is a convenience wrapper. Apps that don't use Express
 * can use PasswordAuthenticator directly. Bodies are validated with Zod;
 * the routes never reveal whether a login failed because of the user ID,
 * the password, or an unreadable stored hash.
 *
 * Usage:
 *   const routes = createExpressRoutes(authenticator, { onAuthenticationSuccess });
 *   app.use(express.json());
 *   app.use('/api/auth/password', routes);
 *
 * Sessions and cookies are out of scope: issue them from
 * `onAuthenticationSuccess`.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { isHashError } from '@idhash/core';
import { PasswordAuthenticator, UserExistsError } from './authenticator.js';

// ============================================================
// Zod Schemas — strict input validation for every route
// ============================================================

const credentialsSchema = z.object({
  userId: z.string().min(1),
  password: z.string(),
}).strict();

const changePasswordSchema = z.object({
  userId: z.string().min(1),
  currentPassword: z.string(),
  newPassword: z.string(),
}).strict();

const importSchema = z.object({
  userId: z.string().min(1),
  passwordHash: z.string().min(1),
}).strict();

export interface ExpressRoutesConfig {
  /**
   * Called after successful registration (e.g. send a welcome e-mail).
   */
  onRegistrationSuccess?: (userId: string) => Promise<void>;

  /**
   * Called after successful authentication. Use this to create a session,
   * JWT, or whatever your app uses for auth state.
   * Return an object that will be merged into the response JSON.
   */
  onAuthenticationSuccess?: (userId: string) => Promise<Record<string, unknown>>;

  /**
   * Decide whether the caller may import legacy hashes (e.g. check an admin
   * session). `POST /import` is only mounted when this is provided.
   */
  authorizeImport?: (req: Request) => Promise<boolean>;
}

/**
 * Create Express router with password routes.
 *
 * Routes:
 *   POST /register — Create a user            { userId, password }
 *   POST /login    — Verify a password        { userId, password }
 *   POST /password — Change a password        { userId, currentPassword, newPassword }
 *   POST /import   — Store a legacy hash      { userId, passwordHash }  (only with `authorizeImport`)
 */
export function createExpressRoutes(
  authenticator: PasswordAuthenticator,
  config: ExpressRoutesConfig = {},
): Router {
  const router = Router();

  router.post('/register', async (req: Request, res: Response) => {
    try {
      const parsed = credentialsSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request body', details: parsed.error.flatten().fieldErrors });
        return;
      }
      const { userId, password } = parsed.data;

      try {
        await authenticator.register(userId, password);
      } catch (error) {
        if (error instanceof UserExistsError) {
          res.status(409).json({ error: 'User already exists' });
          return;
        }
        throw error;
      }

      if (config.onRegistrationSuccess) {
        await config.onRegistrationSuccess(userId);
      }

      res.status(201).json({ userId });
    } catch (error) {
      console.error('[idhash] Registration error:', error);
      res.status(500).json({ error: 'Failed to register user' });
    }
  });

  router.post('/login', async (req: Request, res: Response) => {
    try {
      const parsed = credentialsSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request body', details: parsed.error.flatten().fieldErrors });
        return;
      }
      const { userId, password } = parsed.data;

      const result = await authenticator.authenticate(userId, password);
      if (!result.verified) {
        res.status(401).json({ error: 'Invalid credentials' });
        return;
      }

      let extra: Record<string, unknown> = {};
      if (config.onAuthenticationSuccess) {
        extra = await config.onAuthenticationSuccess(userId);
      }

      res.json({ ...extra, verified: true, userId });
    } catch (error) {
      console.error('[idhash] Login error:', error);
      res.status(500).json({ error: 'Failed to verify credentials' });
    }
  });

  router.post('/password', async (req: Request, res: Response) => {
    try {
      const parsed = changePasswordSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request body', details: parsed.error.flatten().fieldErrors });
        return;
      }
      const { userId, currentPassword, newPassword } = parsed.data;

      const updated = await authenticator.changePassword(userId, currentPassword, newPassword);
      if (!updated) {
        res.status(401).json({ error: 'Invalid credentials' });
        return;
      }

      res.json({ updated: true });
    } catch (error) {
      console.error('[idhash] Password change error:', error);
      res.status(500).json({ error: 'Failed to change password' });
    }
  });

  const { authorizeImport } = config;
  if (authorizeImport) {
    router.post('/import', async (req: Request, res: Response) => {
      try {
        if (!(await authorizeImport(req))) {
          res.status(403).json({ error: 'Forbidden' });
          return;
        }
        const parsed = importSchema.safeParse(req.body);
        if (!parsed.success) {
          res.status(400).json({ error: 'Invalid request body', details: parsed.error.flatten().fieldErrors });
          return;
        }
        const { userId, passwordHash } = parsed.data;

        await authenticator.importHash(userId, passwordHash);
        res.status(201).json({ userId });
      } catch (error) {
        if (isHashError(error)) {
          res.status(400).json({ error: error.message, code: error.code });
          return;
        }
        if (error instanceof UserExistsError) {
          res.status(409).json({ error: 'User already exists' });
          return;
        }
        console.error('[idhash] Import error:', error);
        res.status(500).json({ error: 'Failed to import hash' });
      }
    });
  }

  return router;
}

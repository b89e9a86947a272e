/**
 * Identity API routes.
 *
 * POST /tokens: Password authentication; returns the token in the body and
 *               in the X-Subject-Token header.
 * POST /logout: Revoke the token sent in X-Auth-Token, if any.
 */

import { Router } from 'express';
import { parseLoginRequest } from '../domain/identity';
import { IdentityService } from '../services/identity-service';
import { AUTH_TOKEN_HEADER } from './middleware';

export const SUBJECT_TOKEN_HEADER = 'X-Subject-Token';

export function createAuthRoutes(identity: IdentityService): Router {
  const router = Router();

  router.post('/tokens', async (req, res, next) => {
    try {
      const credentials = parseLoginRequest(req.body);
      const issued = await identity.login(credentials);
      res.set(SUBJECT_TOKEN_HEADER, issued.token);
      res.status(200).json(issued);
    } catch (err) {
      next(err);
    }
  });

  router.post('/logout', async (req, res, next) => {
    try {
      await identity.logout(req.header(AUTH_TOKEN_HEADER));
      res.json({ detail: 'Logged out' });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

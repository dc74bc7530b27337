import type { NextFunction, Request, Response } from 'express';
import { ANONYMOUS_ACTOR, AuthError, type Actor } from '@shortexec/core';
import { actorFromClaims, type ApiTokenClaims, type AuthService } from '../services/auth';

export type RequestWithActor = Request & {
  auth?: ApiTokenClaims;
  actor?: Actor;
};

export function actorOf(req: RequestWithActor): Actor {
  return req.actor ?? ANONYMOUS_ACTOR;
}

/**
 * Resolve the viewing actor from an optional bearer token. No header means an anonymous
 * actor; a malformed or invalid token is rejected outright.
 */
export function attachActor(auth: AuthService) {
  return (req: RequestWithActor, _res: Response, next: NextFunction): void => {
    const header = String(req.header('authorization') || '');
    if (!header) {
      req.actor = ANONYMOUS_ACTOR;
      next();
      return;
    }

    const [scheme, token] = header.split(' ');
    if (scheme?.toLowerCase() !== 'bearer' || !token) {
      next(new AuthError('Malformed authorization header.'));
      return;
    }

    const claims = auth.verifyApiToken(token);
    if (!claims) {
      next(new AuthError('Invalid bearer token.'));
      return;
    }

    req.auth = claims;
    req.actor = actorFromClaims(claims);
    next();
  };
}

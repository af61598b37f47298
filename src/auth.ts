import type { RequestHandler, Response } from 'express';
import jwt from 'jsonwebtoken';

import type { AppConfig } from './config.js';

export class AuthorizationError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, code: string, status = 403) {
    super(message);
    this.name = 'AuthorizationError';
    this.code = code;
    this.status = status;
  }
}

interface AuthContext {
  subject: string | null;
  scopes: string[];
}

export interface LeagueAuth {
  disabled: boolean;
  requireAuth: RequestHandler;
  requireScope: (scope: string) => RequestHandler;
}

const readContext = (res: Response): AuthContext | undefined => {
  const value: unknown = res.locals.auth;
  if (value && typeof value === 'object' && 'scopes' in value && Array.isArray(value.scopes)) {
    const scopes = value.scopes.filter((scope): scope is string => typeof scope === 'string');
    const subject = 'subject' in value && typeof value.subject === 'string' ? value.subject : null;
    return { subject, scopes };
  }
  return undefined;
};

const toContext = (payload: string | jwt.JwtPayload): AuthContext => {
  if (typeof payload === 'string') {
    return { subject: null, scopes: [] };
  }
  const scope = typeof payload.scope === 'string' ? payload.scope : '';
  return {
    subject: payload.sub ?? null,
    scopes: scope.split(' ').filter(Boolean),
  };
};

export const createAuth = (config: AppConfig['auth']): LeagueAuth => {
  const secret = config.sharedSecret;
  if (config.disabled || !secret) {
    const passthrough: RequestHandler = (_req, _res, next) => next();
    return { disabled: true, requireAuth: passthrough, requireScope: () => passthrough };
  }

  const requireAuth: RequestHandler = (req, res, next) => {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return res.status(401).send({ error: 'missing_token', message: 'Authorization header missing bearer token.' });
    }

    const token = authHeader.slice('Bearer '.length);

    try {
      const verifyOptions: jwt.VerifyOptions & { complete: false } = {
        algorithms: ['HS256'],
        complete: false,
      };
      if (config.audience) verifyOptions.audience = config.audience;
      if (config.issuer) verifyOptions.issuer = config.issuer;

      const payload = jwt.verify(token, secret, verifyOptions);
      res.locals.auth = toContext(payload);
      return next();
    } catch (err) {
      console.error('auth_invalid_token', err instanceof Error ? err.message : err);
      return res.status(401).send({ error: 'invalid_token', message: 'Invalid or expired token.' });
    }
  };

  const requireScope =
    (scope: string): RequestHandler =>
    (_req, res, next) => {
      const context = readContext(res);
      if (!context || !context.scopes.includes(scope)) {
        const err = new AuthorizationError(`Missing scope ${scope}`, 'insufficient_scope');
        return res.status(err.status).send({ error: err.code, required: scope });
      }
      return next();
    };

  return { disabled: false, requireAuth, requireScope };
};

export interface MintTokenOptions {
  subject: string;
  scopes: string[];
  expiresInSeconds?: number;
  now?: Date;
}

/** Signs an HS256 token the way `requireAuth` verifies it. */
export const mintToken = (config: AppConfig['auth'], options: MintTokenOptions) => {
  if (!config.sharedSecret) {
    throw new AuthorizationError('AUTH_SHARED_SECRET is not set', 'auth_not_configured', 500);
  }

  const issuedAt = Math.floor((options.now ?? new Date()).getTime() / 1000);
  const payload: jwt.JwtPayload = {
    sub: options.subject,
    scope: options.scopes.join(' '),
    iat: issuedAt,
    exp: issuedAt + (options.expiresInSeconds ?? 3600),
  };
  if (config.audience) payload.aud = config.audience;
  if (config.issuer) payload.iss = config.issuer;

  return { token: jwt.sign(payload, config.sharedSecret, { algorithm: 'HS256' }), payload };
};

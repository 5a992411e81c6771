import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { UnauthorizedError, ForbiddenError } from '../utils/errors.js';
import { authLogger } from '../utils/logger.js';

/**
 * Claims the host puts in the bearer tokens it issues to plugin callers
 */
export const AuthUserSchema = z.object({
    userExternalId: z.string().min(1),
    username: z.string().min(1),
    name: z.string().default(''),
    isSuperuser: z.boolean().default(false),
});

export type AuthUser = z.infer<typeof AuthUserSchema>;

/**
 * Middleware to authenticate the host's JWT
 * No token → 401, bad or expired token → 403
 */
export function authenticateToken(secret: string): RequestHandler {
    return (req: Request, _res: Response, next: NextFunction): void => {
        const authHeader = req.headers['authorization'];
        const [scheme, token] = (authHeader ?? '').split(' ');

        if (scheme !== 'Bearer' || !token) {
            next(new UnauthorizedError());
            return;
        }

        let decoded: unknown;
        try {
            decoded = jwt.verify(token, secret);
        } catch (err) {
            authLogger.debug({ err }, 'Rejected bearer token');
            next(new ForbiddenError('Invalid or expired token'));
            return;
        }

        const claims = AuthUserSchema.safeParse(decoded);
        if (!claims.success) {
            next(new ForbiddenError('Invalid or expired token'));
            return;
        }

        req.user = claims.data;
        next();
    };
}

/**
 * The authenticated caller of a route mounted behind authenticateToken
 */
export function requireUser(req: Request): AuthUser {
    if (!req.user) {
        throw new UnauthorizedError();
    }
    return req.user;
}

/**
 * Gate for routes that write to the ERP on the host's behalf; only the
 * host's service account and superusers may call them
 */
export function requireSuperuser(req: Request, _res: Response, next: NextFunction): void {
    if (!req.user) {
        next(new UnauthorizedError());
        return;
    }
    if (!req.user.isSuperuser) {
        authLogger.warn({ userExternalId: req.user.userExternalId, path: req.originalUrl }, 'Superuser route refused');
        next(new ForbiddenError('Superuser access required'));
        return;
    }
    next();
}

/**
 * Sign a token the way the host does. Used by the CLI and tests.
 */
export function signToken(user: z.input<typeof AuthUserSchema>, secret: string, expiresInSeconds: number = 3600): string {
    return jwt.sign(AuthUserSchema.parse(user), secret, { expiresIn: expiresInSeconds });
}

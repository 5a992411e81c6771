// src/types/express.d.ts
import type { AuthUser } from '../middleware/auth.js';

declare global {
    namespace Express {
        interface Request {
            user?: AuthUser;
        }
    }
}

export {};

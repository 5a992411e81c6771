/**
 * Host Event Routes
 *
 * Entry point for a host that runs out of process: it posts each save
 * after committing it, with the previous status it read itself. Only a
 * superuser token (the host's service account) may post events.
 */

import { Router } from 'express';
import { SyncEventSchema } from '@care-erp/shared';
import { typedRoute } from '../middleware/asyncHandler.js';
import { requireSuperuser } from '../middleware/auth.js';
import type { SyncEventDispatcher } from '../services/hooks/dispatcher.js';

export interface HookRouteDeps {
    dispatcher: Pick<SyncEventDispatcher, 'afterSave'>;
}

export function createHookRouter({ dispatcher }: HookRouteDeps): Router {
    const router: Router = Router();

    /**
     * POST /api/hooks/events
     * Runs the sync handlers of the event; handler failures answer with the error envelope
     */
    router.post('/events', requireSuperuser, typedRoute(SyncEventSchema, 'body', async (event, _req, res) => {
        const transitions = await dispatcher.afterSave(event);
        res.json({ transitions });
    }));

    return router;
}

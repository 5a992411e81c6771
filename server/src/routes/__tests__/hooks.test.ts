import request from 'supertest';
import { makeInvoice } from '@care-erp/shared/testing';
import { createTestApp } from '../../testing/app.js';
import type { TestApp } from '../../testing/app.js';

const HOST_SERVICE = { userExternalId: 'svc-host', username: 'care-host', name: 'Care Host', isSuperuser: true };

describe('POST /api/hooks/events', () => {
    let t: TestApp;

    beforeEach(() => {
        t = createTestApp();
    });

    it('syncs an issued invoice and reports the transition', async () => {
        t.repository.invoices.set('inv-1', makeInvoice({ status: 'issued' }));
        t.erp.reply('api/account/move', { invoice: { id: 301, name: 'INV/2024/0007' } });

        const res = await request(t.app)
            .post('/api/hooks/events')
            .set('Authorization', t.bearer(HOST_SERVICE))
            .send({ entity: 'invoice', externalId: 'inv-1', status: 'issued', previousStatus: 'draft' });

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ transitions: ['invoice.issued'] });
        expect(t.erp.callsTo('api/account/move')).toHaveLength(1);
        expect(t.jobs.all().map((job) => job.targetExternalId)).toEqual(['inv-1']);
    });

    it('ignores a voided draft', async () => {
        const res = await request(t.app)
            .post('/api/hooks/events')
            .set('Authorization', t.bearer(HOST_SERVICE))
            .send({ entity: 'invoice', externalId: 'inv-1', status: 'voided', previousStatus: 'draft' });

        expect(res.body).toEqual({ transitions: [] });
        expect(t.erp.calls).toHaveLength(0);
    });

    it('rejects an unknown entity', async () => {
        const res = await request(t.app)
            .post('/api/hooks/events')
            .set('Authorization', t.bearer(HOST_SERVICE))
            .send({ entity: 'encounter', externalId: 'enc-1' });

        expect(res.status).toBe(400);
        expect(res.body.errors[0].type).toBe('validation_error');
    });

    it('refuses a caller without superuser rights before dispatching', async () => {
        t.repository.invoices.set('inv-1', makeInvoice({ status: 'issued' }));

        const res = await request(t.app)
            .post('/api/hooks/events')
            .set('Authorization', t.bearer())
            .send({ entity: 'invoice', externalId: 'inv-1', status: 'issued', previousStatus: 'draft' });

        expect(res.status).toBe(403);
        expect(res.body).toEqual({ errors: [{ type: 'permission_denied', msg: 'Superuser access required' }] });
        expect(t.erp.calls).toHaveLength(0);
        expect(t.jobs.all()).toEqual([]);
    });
});

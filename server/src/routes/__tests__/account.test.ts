import request from 'supertest';
import { makeAccount } from '@care-erp/shared/testing';
import { createTestApp } from '../../testing/app.js';
import type { TestApp } from '../../testing/app.js';

describe('account payment method routes', () => {
    let t: TestApp;

    beforeEach(() => {
        t = createTestApp();
        t.repository.accounts.set('acc-1', makeAccount({ meta: { other_plugin: { flag: true } } }));
    });

    it('links an account to an ERP payment method', async () => {
        const res = await request(t.app)
            .post('/api/account/acc-1/set-erp-payment-method')
            .set('Authorization', t.bearer())
            .send({ odoo_payment_method_id: 42 });

        expect(res.status).toBe(200);
        expect(res.body).toEqual({
            care_account_id: 'acc-1',
            odoo_payment_method_id: 42,
            message: 'ERP payment method ID set successfully',
        });
        expect(t.repository.accounts.get('acc-1')?.meta).toEqual({
            other_plugin: { flag: true },
            care_odoo: { odoo_payment_method_id: 42 },
        });
    });

    it('removes the link and its empty namespace', async () => {
        t.repository.accounts.set('acc-1', makeAccount({ meta: { care_odoo: { odoo_payment_method_id: 42 } } }));

        const res = await request(t.app)
            .post('/api/account/acc-1/set-erp-payment-method')
            .set('Authorization', t.bearer())
            .send({ odoo_payment_method_id: null });

        expect(res.body).toEqual({
            care_account_id: 'acc-1',
            odoo_payment_method_id: null,
            message: 'ERP payment method ID removed successfully',
        });
        expect(t.repository.accounts.get('acc-1')?.meta).toEqual({});
    });

    it('answers 404 for an unknown account', async () => {
        const res = await request(t.app)
            .post('/api/account/acc-missing/set-erp-payment-method')
            .set('Authorization', t.bearer())
            .send({ odoo_payment_method_id: 42 });

        expect(res.status).toBe(404);
        expect(res.body.errors[0].msg).toBe('Account with ID acc-missing not found');
    });

    it('rejects a non-integer id', async () => {
        const res = await request(t.app)
            .post('/api/account/acc-1/set-erp-payment-method')
            .set('Authorization', t.bearer())
            .send({ odoo_payment_method_id: 'abc' });

        expect(res.status).toBe(400);
        expect(res.body.errors[0].type).toBe('validation_error');
    });

    it('answers 404 when no payment method is linked', async () => {
        const res = await request(t.app)
            .get('/api/account/acc-1/get-erp-payment-method')
            .set('Authorization', t.bearer());

        expect(res.status).toBe(404);
        expect(res.body.errors[0].msg).toBe('No ERP payment method linked for Account acc-1');
        expect(t.erp.calls).toHaveLength(0);
    });

    it('returns the first payment method the ERP reports', async () => {
        t.repository.accounts.set('acc-1', makeAccount({ meta: { care_odoo: { odoo_payment_method_id: 42 } } }));
        t.erp.reply('api/v1/payment/method/42', { payment_method: [{ id: 42, name: 'Corporate Credit' }] });

        const res = await request(t.app)
            .get('/api/account/acc-1/get-erp-payment-method')
            .set('Authorization', t.bearer());

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ id: 42, name: 'Corporate Credit' });
        expect(t.erp.calls).toEqual([{ endpoint: 'api/v1/payment/method/42', payload: {}, method: 'GET' }]);
    });

    it('answers 404 when the ERP no longer knows the payment method', async () => {
        t.repository.accounts.set('acc-1', makeAccount({ meta: { care_odoo: { odoo_payment_method_id: 42 } } }));
        t.erp.reply('api/v1/payment/method/42', { payment_method: [] });

        const res = await request(t.app)
            .get('/api/account/acc-1/get-erp-payment-method')
            .set('Authorization', t.bearer());

        expect(res.status).toBe(404);
        expect(res.body.errors[0].msg).toBe('ERP payment method with ID 42 not found');
    });
});

import request from 'supertest';
import { createTestApp } from '../../testing/app.js';
import type { TestApp } from '../../testing/app.js';
import { ErpConnectionError } from '../../utils/errors.js';

describe('ERP lookup routes', () => {
    let t: TestApp;

    beforeEach(() => {
        t = createTestApp();
    });

    it('searches sponsors with the key in a GET body', async () => {
        t.erp.reply('api/sponsors/search', {
            sponsors: [{ id: 5, name: 'Acme Corp', code: 'ACME', account_id: 12, active: true }],
        });

        const res = await request(t.app)
            .get('/api/sponsor')
            .query({ search_key: 'acme' })
            .set('Authorization', t.bearer());

        expect(res.status).toBe(200);
        expect(res.body).toEqual([
            {
                id: 5,
                name: 'Acme Corp',
                code: 'ACME',
                phone: '',
                email: '',
                city: '',
                account_id: 12,
                account_name: '',
                active: true,
                invoice_count: 0,
            },
        ]);
        expect(t.erp.calls).toEqual([{ endpoint: 'api/sponsors/search', payload: { search_key: 'acme' }, method: 'GET' }]);
    });

    it('sends an empty search key by default', async () => {
        t.erp.reply('api/insurance/companies/search', { insurance_companies: [] });

        const res = await request(t.app).get('/api/insurance-company').set('Authorization', t.bearer());

        expect(res.status).toBe(200);
        expect(res.body).toEqual([]);
        expect(t.erp.calls[0]?.payload).toEqual({ search_key: '' });
    });

    it('keeps a false insurance company code', async () => {
        t.erp.reply('api/insurance/companies/search', {
            insurance_companies: [{ id: 2, name: 'Star Health', code: false, active: true }],
        });

        const res = await request(t.app).get('/api/insurance-company').set('Authorization', t.bearer());

        expect(res.body).toEqual([
            {
                id: 2,
                name: 'Star Health',
                code: false,
                description: null,
                account_id: null,
                account_name: null,
                active: true,
                claim_count: 0,
            },
        ]);
    });

    it('forwards payment methods with their extra fields', async () => {
        t.erp.reply('api/payment/methods/search', { payment_methods: [{ id: 3, name: 'Corporate Credit', journal: 'CRD' }] });

        const res = await request(t.app)
            .get('/api/payment-method')
            .query({ search_key: 'corp' })
            .set('Authorization', t.bearer());

        expect(res.body).toEqual([{ id: 3, name: 'Corporate Credit', journal: 'CRD' }]);
    });

    it('lists credit payment method lines by default', async () => {
        t.erp.reply('api/payment/method/lines', {
            payment_methods: [{ id: 11, name: 'Care of Account', journal_id: 4, journal_name: 'Credit' }],
        });

        const res = await request(t.app).get('/api/payment-method-line').set('Authorization', t.bearer());

        expect(res.body).toEqual([{ id: 11, name: 'Care of Account', code: null, journal_id: 4, journal_name: 'Credit' }]);
        expect(t.erp.calls[0]?.payload).toEqual({ journal_type: 'credit' });
    });

    it('fetches one payment method line', async () => {
        t.erp.reply('api/payment/method/lines/11', {
            payment_method: { id: 11, name: 'Care of Account', code: 'coa', journal_id: 4, journal_name: 'Credit' },
        });

        const res = await request(t.app).get('/api/payment-method-line/11').set('Authorization', t.bearer());

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ id: 11, name: 'Care of Account', code: 'coa', journal_id: 4, journal_name: 'Credit' });
    });

    it('answers 404 for a missing payment method line', async () => {
        t.erp.reply('api/payment/method/lines/99', { success: false });

        const res = await request(t.app).get('/api/payment-method-line/99').set('Authorization', t.bearer());

        expect(res.status).toBe(404);
        expect(res.body.errors[0].msg).toBe('ERP payment method line with ID 99 not found');
    });

    it('wraps a failed search', async () => {
        t.erp.fail('api/sponsors/search', new ErpConnectionError('ERP request timed out', 'api/sponsors/search'));

        const res = await request(t.app).get('/api/sponsor').set('Authorization', t.bearer());

        expect(res.status).toBe(400);
        expect(res.body).toEqual({
            errors: [{ type: 'validation_error', msg: 'Error fetching sponsors from ERP: ERP request timed out' }],
        });
    });
});

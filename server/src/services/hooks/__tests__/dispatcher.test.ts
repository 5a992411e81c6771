/**
 * Event dispatch tests
 *
 * Host saves go through beforeSave → write → afterSave against the
 * in-memory repository, the recording ERP and the in-memory job store.
 */

import {
    makeAccount,
    makeCategory,
    makeDefinition,
    makeDeliveryOrder,
    makeInvoice,
    makeOrganization,
    makePayment,
    makeProduct,
    makeUser,
} from '@care-erp/shared/testing';
import type { SyncEventInput } from '@care-erp/shared';
import type { PluginConfig } from '../../../config/pluginConfig.js';
import { FakeErp } from '../../../testing/fakeErp.js';
import { InMemoryHostRepository } from '../../../testing/inMemoryHostRepository.js';
import { testConfig } from '../../../testing/config.js';
import { ErpServerError } from '../../../utils/errors.js';
import { MemoryJobStore, ReconciliationScheduler } from '../../reconciliation/index.js';
import { createSyncResources } from '../../sync/index.js';
import { SyncEventDispatcher } from '../dispatcher.js';
import { registerSyncHandlers } from '../handlers.js';

const NOW = new Date('2024-03-05T10:00:00.000Z');

function setup(overrides: Partial<PluginConfig> = {}) {
    const config = testConfig(overrides);
    const erp = new FakeErp();
    const repository = new InMemoryHostRepository();
    const store = new MemoryJobStore();
    const scheduler = new ReconciliationScheduler(store, config.reconciliation.delaySeconds, () => NOW);
    const dispatcher = registerSyncHandlers(
        new SyncEventDispatcher(repository),
        createSyncResources({ erp, repository, config }),
        scheduler,
    );

    // the host's save signal, which the invoice number write-back also emits
    repository.onSave(async (input) => {
        await dispatcher.afterSave(await dispatcher.beforeSave(input));
    });

    /** Capture, apply the host write, then dispatch */
    async function save(input: SyncEventInput, write: () => void = () => {}) {
        const event = await dispatcher.beforeSave(input);
        write();
        return dispatcher.afterSave(event);
    }

    return { erp, repository, store, dispatcher, save };
}

describe('SyncEventDispatcher', () => {
    describe('invoices', () => {
        it('syncs a draft → issued invoice once and schedules reconciliation', async () => {
            const { erp, repository, store, save } = setup();
            repository.invoices.set('inv-1', makeInvoice({ status: 'draft' }));
            erp.reply('api/account/move', { invoice: { id: 501, name: 'INV/2024/0001' } });

            const keys = await save({ entity: 'invoice', externalId: 'inv-1', status: 'issued' }, () => {
                repository.invoices.set('inv-1', makeInvoice({ status: 'issued' }));
            });

            expect(keys).toEqual(['invoice.issued']);
            const calls = erp.callsTo('api/account/move');
            expect(calls).toHaveLength(1);
            expect(calls[0]?.payload).toMatchObject({ x_care_id: 'inv-1', bill_type: 'customer' });
            expect(repository.invoices.get('inv-1')?.number).toBe('INV/2024/0001');

            const jobs = store.all();
            expect(jobs).toHaveLength(1);
            expect(jobs[0]).toMatchObject({
                kind: 'invoice',
                targetExternalId: 'inv-1',
                state: 'scheduled',
                runAt: new Date(NOW.getTime() + 60_000),
            });
        });

        it('returns an issued invoice that gets cancelled', async () => {
            const { erp, repository, store, save } = setup();
            repository.invoices.set('inv-1', makeInvoice({ status: 'issued' }));
            erp.reply('api/account/move/return', { reverse_invoice: { id: 502 } });

            const keys = await save({ entity: 'invoice', externalId: 'inv-1', status: 'cancelled' }, () => {
                repository.invoices.set('inv-1', makeInvoice({ status: 'cancelled' }));
            });

            expect(keys).toEqual(['invoice.cancelled']);
            expect(erp.calls).toEqual([
                {
                    endpoint: 'api/account/move/return',
                    payload: { x_care_id: 'inv-1', reason: 'cancelled' },
                    method: 'POST',
                },
            ]);
            expect(store.all()).toEqual([]);
        });

        it('does nothing for a draft invoice that gets voided', async () => {
            const { erp, repository, save } = setup();
            repository.invoices.set('inv-1', makeInvoice({ status: 'draft' }));

            const keys = await save({ entity: 'invoice', externalId: 'inv-1', status: 'voided' }, () => {
                repository.invoices.set('inv-1', makeInvoice({ status: 'voided' }));
            });

            expect(keys).toEqual([]);
            expect(erp.calls).toEqual([]);
        });

        it('uses an explicit previous status over the persisted one', async () => {
            const { erp, repository, save } = setup();
            repository.invoices.set('inv-1', makeInvoice({ status: 'cancelled' }));
            erp.reply('api/account/move/return', { reverse_invoice: { id: 502 } });

            const keys = await save({
                entity: 'invoice',
                externalId: 'inv-1',
                status: 'entered_in_error',
                previousStatus: 'balanced',
            });

            expect(keys).toEqual(['invoice.cancelled']);
            expect(erp.calls[0]?.payload).toEqual({ x_care_id: 'inv-1', reason: 'cancelled' });
        });

        it('ignores a save that only writes the invoice number', async () => {
            const { erp, repository, save } = setup();
            repository.invoices.set('inv-1', makeInvoice({ status: 'issued' }));

            const keys = await save({
                entity: 'invoice',
                externalId: 'inv-1',
                status: 'issued',
                updateFields: ['number'],
            });

            expect(keys).toEqual([]);
            expect(erp.calls).toEqual([]);
        });

        it('skips the status lookup for a created record', async () => {
            const { repository, dispatcher } = setup();
            const lookup = vi.spyOn(repository, 'findInvoiceStatus');

            const event = await dispatcher.beforeSave({
                entity: 'invoice',
                externalId: 'inv-1',
                status: 'draft',
                created: true,
            });

            expect(lookup).not.toHaveBeenCalled();
            expect(event).toMatchObject({ entity: 'invoice', previousStatus: null });
        });

        it('propagates ERP failures and schedules nothing', async () => {
            const { erp, repository, store, save } = setup();
            repository.invoices.set('inv-1', makeInvoice({ status: 'issued' }));
            erp.fail('api/account/move', new ErpServerError('Journal locked', 'api/account/move', 500));

            await expect(save({ entity: 'invoice', externalId: 'inv-1', status: 'issued' })).rejects.toThrow(
                'Journal locked'
            );
            expect(store.all()).toEqual([]);
        });
    });

    describe('payments', () => {
        it('syncs an active payment and schedules reconciliation', async () => {
            const { erp, repository, store, save } = setup();
            repository.payments.set('pay-1', makePayment());
            erp.reply('api/account/move/payment', { payment: { id: 31 } });

            const keys = await save({ entity: 'payment_reconciliation', externalId: 'pay-1', status: 'active', created: true });

            expect(keys).toEqual(['payment_reconciliation.active']);
            expect(erp.callsTo('api/account/move/payment')).toHaveLength(1);
            expect(store.all().map((job) => [job.kind, job.targetExternalId])).toEqual([['payment', 'pay-1']]);
        });

        it('does not schedule reconciliation for an insurer payment that is not sent', async () => {
            const { erp, repository, store, save } = setup({
                insuranceTagId: 'tag-insured',
                insuranceExtensionName: 'insurance_company_id',
            });
            repository.payments.set(
                'pay-1',
                makePayment({
                    issuerType: 'insurer',
                    account: makeAccount({
                        tagExternalIds: ['tag-insured'],
                        extension: { insurance_company_id: 12 },
                    }),
                })
            );

            const keys = await save({ entity: 'payment_reconciliation', externalId: 'pay-1', status: 'active' });

            expect(keys).toEqual(['payment_reconciliation.active']);
            expect(erp.calls).toEqual([]);
            expect(store.all()).toEqual([]);
        });

        it('cancels a payment entered in error with its status as reason', async () => {
            const { erp, repository, save } = setup();
            repository.payments.set('pay-1', makePayment({ status: 'entered_in_error' }));
            erp.reply('api/account/move/payment/cancel', { payment: { id: 31 } });

            const keys = await save({ entity: 'payment_reconciliation', externalId: 'pay-1', status: 'entered_in_error' });

            expect(keys).toEqual(['payment_reconciliation.cancelled']);
            expect(erp.calls[0]).toEqual({
                endpoint: 'api/account/move/payment/cancel',
                payload: { x_care_id: 'pay-1', reason: 'entered_in_error' },
                method: 'POST',
            });
        });

        it('does nothing for a draft payment', async () => {
            const { erp, save } = setup();

            const keys = await save({ entity: 'payment_reconciliation', externalId: 'pay-1', status: 'draft', created: true });

            expect(keys).toEqual([]);
            expect(erp.calls).toEqual([]);
        });
    });

    describe('catalog and partners', () => {
        it('syncs every user save', async () => {
            const { erp, repository, save } = setup();
            repository.users.set('user-1', makeUser());
            erp.reply('api/add/user', { user: { id: 7 } });

            const keys = await save({ entity: 'user', externalId: 'user-1' });

            expect(keys).toEqual(['user.saved']);
            expect(erp.callsTo('api/add/user')).toHaveLength(1);
        });

        it.each([
            [{ entity: 'resource_category', externalId: 'cat-1', resourceType: 'product_knowledge' }],
            [{ entity: 'organization', externalId: 'org-1', orgType: 'team' }],
            [{ entity: 'delivery_order', externalId: 'do-1', status: 'completed', originExternalId: 'do-0' }],
            [{ entity: 'delivery_order', externalId: 'do-1', status: 'pending' }],
            [{ entity: 'product', externalId: 'prod-1', chargeItemDefinitionExternalId: null }],
        ] satisfies Array<[SyncEventInput]>)('ignores %o', async (input) => {
            const { erp, save } = setup();

            expect(await save(input)).toEqual([]);
            expect(erp.calls).toEqual([]);
        });

        it('syncs a charge item category to api/add/category', async () => {
            const { erp, repository, save } = setup();
            repository.categories.set('cat-lab', makeCategory());
            erp.reply('api/add/category', { category: { id: 12 } });

            const keys = await save({
                entity: 'resource_category',
                externalId: 'cat-lab',
                resourceType: 'charge_item_definition',
            });

            expect(keys).toEqual(['resource_category.saved']);
            expect(erp.callsTo('api/add/category')[0]?.payload).toEqual({
                category_name: 'Laboratory',
                parent_x_care_id: 'cat-root',
                x_care_id: 'cat-lab',
            });
        });

        it('syncs a supplier organization as a company partner', async () => {
            const { erp, repository, save } = setup();
            repository.organizations.set('org-supplier-1', makeOrganization());
            erp.reply('api/add/partner', { partner: { id: 40 } });

            const keys = await save({ entity: 'organization', externalId: 'org-supplier-1', orgType: 'product_supplier' });

            expect(keys).toEqual(['organization.saved']);
            expect(erp.callsTo('api/add/partner')[0]?.payload).toEqual({
                name: 'MedSupply Traders',
                x_care_id: 'org-supplier-1',
                partner_type: 'company',
                email: 'orders@medsupply.example',
                phone: '+914400000000',
                state: 'kerala',
                agent: false,
            });
        });

        it('syncs a saved charge item definition as a product', async () => {
            const { erp, repository, save } = setup();
            repository.definitions.set('cid-cbc', makeDefinition());
            erp.reply('api/add/product', { product: { id: 88 } });

            const keys = await save({ entity: 'charge_item_definition', externalId: 'cid-cbc' });

            expect(keys).toEqual(['charge_item_definition.saved']);
            expect(erp.callsTo('api/add/product')[0]?.payload).toEqual({
                product_name: 'CARE: Complete Blood Count',
                x_care_id: 'cid-cbc',
                mrp: 250,
                cost: 120,
                category: { category_name: 'Laboratory', parent_x_care_id: 'cat-root', x_care_id: 'cat-lab' },
                taxes: [{ tax_name: 'GST 5%', tax_percentage: 5 }],
                hsn: '',
                status: 'active',
            });
        });

        it('syncs a billable product through its charge item definition', async () => {
            const { erp, repository, save } = setup();
            repository.products.set('prod-1', makeProduct());
            erp.reply('api/add/product', { product: { id: 89 } });

            const keys = await save({
                entity: 'product',
                externalId: 'prod-1',
                chargeItemDefinitionExternalId: 'cid-paracetamol',
            });

            expect(keys).toEqual(['product.saved']);
            expect(erp.callsTo('api/add/product')[0]?.payload).toMatchObject({
                product_name: 'CARE: Paracetamol 500mg',
                x_care_id: 'cid-paracetamol',
                hsn: '30049099',
            });
        });

        it('bills a completed delivery order from an external supplier', async () => {
            const { erp, repository, save } = setup();
            repository.deliveryOrders.set('do-1', makeDeliveryOrder());
            erp.reply('api/account/move', { invoice: { id: 900 } });

            const keys = await save({ entity: 'delivery_order', externalId: 'do-1', status: 'completed' });

            expect(keys).toEqual(['delivery_order.completed']);
            expect(erp.callsTo('api/account/move')[0]?.payload).toMatchObject({ x_care_id: 'do-1', bill_type: 'vendor' });
        });
    });
});

/**
 * Account Routes
 *
 * Link a host billing account to an ERP payment method. The link lives in
 * the account's meta map and is read back when invoices are synced.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { ERP_ENDPOINTS, ErpCashReplySchema, PaymentMethodDataSchema, SetAccountPaymentMethodSchema } from '@care-erp/shared';
import type { HostAccount } from '@care-erp/shared';
import { asyncHandler, typedRoute } from '../middleware/asyncHandler.js';
import type { PluginConfig } from '../config/pluginConfig.js';
import type { HostRepository } from '../repositories/hostRepository.js';
import type { ErpRpc } from '../services/erp/client.js';
import { relay } from '../services/erp/relay.js';
import { readPaymentMethodLink, writePaymentMethodLink } from '../services/sync/accountLink.js';
import { NotFoundError } from '../utils/errors.js';
import { syncLogger } from '../utils/logger.js';

export interface AccountRouteDeps {
    erp: ErpRpc;
    repository: Pick<HostRepository, 'findAccount' | 'updateAccountMeta'>;
    config: Pick<PluginConfig, 'pluginMetaNamespace' | 'accountPaymentMethodKey'>;
}

export function createAccountRouter({ erp, repository, config }: AccountRouteDeps): Router {
    const router: Router = Router();
    const { pluginMetaNamespace: namespace, accountPaymentMethodKey: key } = config;

    async function loadAccount(accountId: string): Promise<HostAccount> {
        const account = await repository.findAccount(accountId);
        if (!account) {
            throw new NotFoundError(`Account with ID ${accountId} not found`, 'Account', accountId);
        }
        return account;
    }

    /**
     * POST /api/account/:accountId/set-erp-payment-method
     * Body `{ odoo_payment_method_id }`; null removes the link
     */
    router.post('/:accountId/set-erp-payment-method', typedRoute(SetAccountPaymentMethodSchema, 'body', async (body, req, res) => {
        const { accountId } = req.params;
        const account = await loadAccount(accountId);
        const paymentMethodId = body.odoo_payment_method_id;

        if (paymentMethodId !== null) {
            await repository.updateAccountMeta(accountId, writePaymentMethodLink(account.meta, namespace, key, paymentMethodId));
            syncLogger.info({ accountId, paymentMethodId }, 'Linked account to ERP payment method');
            res.json({
                care_account_id: accountId,
                odoo_payment_method_id: paymentMethodId,
                message: 'ERP payment method ID set successfully',
            });
            return;
        }

        if (readPaymentMethodLink(account.meta, namespace, key) !== null) {
            await repository.updateAccountMeta(accountId, writePaymentMethodLink(account.meta, namespace, key, null));
            syncLogger.info({ accountId }, 'Unlinked account from ERP payment method');
        }

        res.json({
            care_account_id: accountId,
            odoo_payment_method_id: null,
            message: 'ERP payment method ID removed successfully',
        });
    }));

    /**
     * GET /api/account/:accountId/get-erp-payment-method
     * The linked ERP payment method as the ERP describes it
     */
    router.get('/:accountId/get-erp-payment-method', asyncHandler(async (req: Request, res: Response) => {
        const { accountId } = req.params;
        const account = await loadAccount(accountId);

        const paymentMethodId = readPaymentMethodLink(account.meta, namespace, key);
        if (paymentMethodId === null) {
            throw new NotFoundError(`No ERP payment method linked for Account ${accountId}`, 'Account', accountId);
        }

        const paymentMethod = await relay(
            erp,
            { endpoint: `${ERP_ENDPOINTS.paymentMethodById}/${paymentMethodId}`, method: 'GET' },
            'Error fetching payment method from ERP',
            (reply) => {
                const found = ErpCashReplySchema.parse(reply).payment_method;
                if (!Array.isArray(found) || found.length === 0) {
                    throw new NotFoundError(`ERP payment method with ID ${paymentMethodId} not found`, 'PaymentMethod', paymentMethodId);
                }
                return PaymentMethodDataSchema.parse(found[0]);
            },
        );

        res.json(paymentMethod);
    }));

    return router;
}

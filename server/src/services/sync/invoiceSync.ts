/**
 * Invoice Sync - host invoices as ERP customer invoices
 *
 * A successful create writes the ERP invoice number back onto the host
 * invoice. That write touches only `number`, which the invoice hook
 * ignores, so the write-back never re-enters the sync.
 */

import {
    AccountMoveRequestSchema,
    AccountMoveReturnRequestSchema,
    ERP_ENDPOINTS,
    InvoiceReplySchema,
    NotFoundError,
    ReverseInvoiceReplySchema,
    buildInvoiceRequest,
    getInsuranceCompanyId,
    hasInsuranceTag,
    parseRequest,
} from '@care-erp/shared';
import type { HostAccount, InvoiceBuildContext, InvoiceInsurance } from '@care-erp/shared';
import type { PluginConfig } from '../../config/pluginConfig.js';
import { parseReply } from '../erp/client.js';
import { syncLogger } from '../../utils/logger.js';
import { readPaymentMethodLink } from './accountLink.js';
import type { ErpId, SyncDeps } from './types.js';

const log = syncLogger.child({ resource: 'invoice' });

function resolveInsurance(config: PluginConfig, account: HostAccount | null): InvoiceInsurance | null {
    const { insuranceTagId, insuranceExtensionName } = config;
    if (!account || !insuranceTagId || !insuranceExtensionName) return null;
    if (!hasInsuranceTag(account, insuranceTagId)) return null;

    const companyId = getInsuranceCompanyId(account, insuranceExtensionName);
    return companyId === null ? null : { tagExternalId: insuranceTagId, companyId };
}

export function buildInvoiceContext(config: PluginConfig, account: HostAccount | null): InvoiceBuildContext {
    return {
        defaultState: config.defaultPartnerState,
        patientIdentifierConfigId: config.patientIdentifierConfigId,
        paymentMethodId: account
            ? readPaymentMethodLink(account.meta, config.pluginMetaNamespace, config.accountPaymentMethodKey)
            : null,
        insurance: resolveInsurance(config, account),
    };
}

export async function syncInvoice(deps: SyncDeps, externalId: string): Promise<ErpId> {
    const invoice = await deps.repository.findInvoice(externalId);
    if (!invoice) {
        throw new NotFoundError('Invoice not found', 'Invoice', externalId);
    }

    const context = buildInvoiceContext(deps.config, invoice.account);
    const data = parseRequest(AccountMoveRequestSchema, buildInvoiceRequest(invoice, context));
    const reply = parseReply(
        InvoiceReplySchema,
        ERP_ENDPOINTS.accountMove,
        await deps.erp.call(ERP_ENDPOINTS.accountMove, data)
    );

    const number = reply.invoice.name;
    if (number) {
        await deps.repository.setInvoiceNumber(externalId, number);
    }

    log.info({ externalId, erpId: reply.invoice.id, number }, 'Invoice synced');
    return reply.invoice.id;
}

/**
 * Reverse an invoice in the ERP. Used by the hook (reason: the host
 * status) and by reconciliation (reason: rollback cleanup), when the host
 * record may already be gone.
 */
export async function returnInvoice(deps: SyncDeps, externalId: string, reason: string): Promise<ErpId> {
    const data = parseRequest(AccountMoveReturnRequestSchema, { x_care_id: externalId, reason });
    const reply = parseReply(
        ReverseInvoiceReplySchema,
        ERP_ENDPOINTS.accountMoveReturn,
        await deps.erp.call(ERP_ENDPOINTS.accountMoveReturn, data)
    );

    log.info({ externalId, erpId: reply.reverse_invoice.id, reason }, 'Invoice returned');
    return reply.reverse_invoice.id;
}

export async function syncInvoiceReturn(deps: SyncDeps, externalId: string): Promise<ErpId> {
    const invoice = await deps.repository.findInvoice(externalId);
    if (!invoice) {
        throw new NotFoundError('Invoice not found', 'Invoice', externalId);
    }
    return returnInvoice(deps, externalId, invoice.status);
}

/**
 * Payment Sync - host payment reconciliations as ERP payments
 *
 * Insurer-issued payments are validated but never sent: the ERP settles
 * them through its own insurance flow.
 */

import {
    ERP_ENDPOINTS,
    NotFoundError,
    PaymentCancelRequestSchema,
    PaymentReplySchema,
    PaymentRequestSchema,
    ValidationError,
    buildPaymentRequest,
    getInsuranceCompanyId,
    hasInsuranceTag,
    parseRequest,
} from '@care-erp/shared';
import type { HostPaymentReconciliation } from '@care-erp/shared';
import type { PluginConfig } from '../../config/pluginConfig.js';
import { parseReply } from '../erp/client.js';
import { syncLogger } from '../../utils/logger.js';
import type { ErpId, SyncDeps } from './types.js';

const log = syncLogger.child({ resource: 'payment' });

const INSURER_ISSUER = 'insurer';

/**
 * Check an insurer payment against the insurance configuration.
 * Missing configuration and a missing or malformed company id are errors;
 * an account without the insurance tag is logged and skipped.
 */
function checkInsurerPayment(config: PluginConfig, payment: HostPaymentReconciliation): void {
    const { insuranceTagId, insuranceExtensionName } = config;
    if (!insuranceExtensionName) {
        throw new ValidationError('INSURANCE_EXTENSION_NAME must be configured when issuer is set on payment');
    }
    if (!insuranceTagId) {
        throw new ValidationError('INSURANCE_TAG_ID must be configured when issuer is set on payment');
    }

    if (!hasInsuranceTag(payment.account, insuranceTagId)) {
        log.warn(
            { externalId: payment.externalId, account: payment.account.externalId },
            'Insurer payment on an account without the insurance tag, skipping'
        );
        return;
    }

    if (getInsuranceCompanyId(payment.account, insuranceExtensionName) === null) {
        throw new ValidationError('Account must have insurance company id when issuer is set on insurance');
    }
}

export async function syncPayment(deps: SyncDeps, externalId: string): Promise<ErpId> {
    const payment = await deps.repository.findPayment(externalId);
    if (!payment) {
        throw new NotFoundError('Payment reconciliation not found', 'PaymentReconciliation', externalId);
    }

    if (payment.issuerType === INSURER_ISSUER) {
        checkInsurerPayment(deps.config, payment);
        log.info({ externalId }, 'Insurer payment not sent to ERP');
        return null;
    }

    const data = parseRequest(PaymentRequestSchema, buildPaymentRequest(payment, deps.config.defaultPartnerState));
    const reply = parseReply(
        PaymentReplySchema,
        ERP_ENDPOINTS.payment,
        await deps.erp.call(ERP_ENDPOINTS.payment, data)
    );

    log.info({ externalId, erpId: reply.payment.id, journal: data.journal_input }, 'Payment synced');
    return reply.payment.id;
}

/**
 * Cancel a payment in the ERP. Works without the host record so
 * reconciliation can clean up after a rolled back write.
 */
export async function cancelPayment(deps: SyncDeps, externalId: string, reason: string): Promise<ErpId> {
    const data = parseRequest(PaymentCancelRequestSchema, { x_care_id: externalId, reason });
    const reply = parseReply(
        PaymentReplySchema,
        ERP_ENDPOINTS.paymentCancel,
        await deps.erp.call(ERP_ENDPOINTS.paymentCancel, data)
    );

    log.info({ externalId, erpId: reply.payment.id, reason }, 'Payment cancelled');
    return reply.payment.id;
}

export async function syncPaymentCancel(deps: SyncDeps, externalId: string): Promise<ErpId> {
    const payment = await deps.repository.findPayment(externalId);
    if (!payment) {
        throw new NotFoundError('Payment reconciliation not found', 'PaymentReconciliation', externalId);
    }
    return cancelPayment(deps, externalId, payment.status);
}

/**
 * Catalog Sync - charge item definitions as ERP products, resource
 * categories as ERP product categories
 *
 * Product and category upserts are keyed by x_care_id, so a product may
 * reach the ERP before its category.
 */

import {
    CategoryDataSchema,
    CategoryReplySchema,
    ERP_ENDPOINTS,
    NotFoundError,
    ProductDataSchema,
    ProductReplySchema,
    buildCategoryData,
    buildProductData,
    parseRequest,
} from '@care-erp/shared';
import type { HostChargeItemDefinition } from '@care-erp/shared';
import { parseReply } from '../erp/client.js';
import { syncLogger } from '../../utils/logger.js';
import type { ErpId, SyncDeps } from './types.js';

const log = syncLogger.child({ resource: 'catalog' });

async function pushProduct(deps: SyncDeps, definition: HostChargeItemDefinition, hsn: string): Promise<ErpId> {
    const data = parseRequest(ProductDataSchema, buildProductData(definition, { hsn }));
    const reply = parseReply(
        ProductReplySchema,
        ERP_ENDPOINTS.addProduct,
        await deps.erp.call(ERP_ENDPOINTS.addProduct, data)
    );
    return reply.product?.id ?? null;
}

export async function syncChargeItemDefinition(deps: SyncDeps, externalId: string): Promise<ErpId> {
    const definition = await deps.repository.findChargeItemDefinition(externalId);
    if (!definition) {
        throw new NotFoundError('Charge item definition not found', 'ChargeItemDefinition', externalId);
    }

    const erpId = await pushProduct(deps, definition, '');
    log.info({ externalId, erpId }, 'Charge item definition synced');
    return erpId;
}

/**
 * A product is only billable through its charge item definition; the HSN
 * code comes from the product knowledge's alternate identifier.
 */
export async function syncProduct(deps: SyncDeps, externalId: string): Promise<ErpId> {
    const product = await deps.repository.findProduct(externalId);
    if (!product) {
        throw new NotFoundError('Product not found', 'Product', externalId);
    }
    if (!product.chargeItemDefinition) {
        log.debug({ externalId }, 'Product has no charge item definition, skipping');
        return null;
    }

    const hsn = product.productKnowledge?.alternateIdentifier ?? '';
    const erpId = await pushProduct(deps, product.chargeItemDefinition, hsn);
    log.info({ externalId, erpId }, 'Product synced');
    return erpId;
}

export async function syncCategory(deps: SyncDeps, externalId: string): Promise<ErpId> {
    const category = await deps.repository.findCategory(externalId);
    if (!category) {
        throw new NotFoundError('Resource category not found', 'ResourceCategory', externalId);
    }

    const data = parseRequest(CategoryDataSchema, buildCategoryData(category));
    const reply = parseReply(
        CategoryReplySchema,
        ERP_ENDPOINTS.addCategory,
        await deps.erp.call(ERP_ENDPOINTS.addCategory, data)
    );

    const erpId = reply.category?.id ?? null;
    log.info({ externalId, erpId }, 'Category synced');
    return erpId;
}

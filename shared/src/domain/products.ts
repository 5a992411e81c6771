/**
 * Product & Category Mapping - Pure Functions
 *
 * Charge item definitions become ERP products. The category is always
 * built alongside the product so the ERP sees the parent reference in the
 * same payload.
 */

import type { HostCategory, HostChargeItemDefinition } from '../types/index.js';
import type { CategoryData, ProductData } from '../schemas/erpRequests.js';
import { PRODUCT_NAME_PREFIX, UNCATEGORIZED_CATEGORY } from './constants.js';
import { getBasePrice, getPurchasePrice, getTaxes, toAmount } from './pricing.js';

export function buildCategoryData(category: HostCategory | null): CategoryData {
  if (!category) return { ...UNCATEGORIZED_CATEGORY };
  return {
    category_name: category.title,
    parent_x_care_id: category.parentExternalId ?? '',
    x_care_id: category.externalId,
  };
}

export interface ProductBuildOptions {
  /** Overrides the definition's own (lenient) base price */
  basePrice?: string;
  /** Classification code from product knowledge */
  hsn?: string;
}

/**
 * The ERP keeps the selling price in `mrp` and the purchase price in `cost`.
 */
export function buildProductData(definition: HostChargeItemDefinition, options: ProductBuildOptions = {}): ProductData {
  const basePrice = options.basePrice ?? getBasePrice(definition.priceComponents);
  return {
    product_name: `${PRODUCT_NAME_PREFIX}${definition.title}`,
    x_care_id: definition.externalId,
    mrp: toAmount(basePrice),
    cost: toAmount(getPurchasePrice(definition.priceComponents)),
    category: buildCategoryData(definition.category),
    taxes: getTaxes(definition.priceComponents),
    hsn: options.hsn ?? '',
    status: definition.status,
  };
}

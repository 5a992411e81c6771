/**
 * Price Component Extraction - Pure Functions
 *
 * Reads the host pricing engine's monetary components. Amounts stay as the
 * decimal strings the pricing engine produced; conversion to numbers only
 * happens where the ERP payload wants a float.
 *
 * Rules:
 * - base price: first component of type "base"
 * - purchase price: "informational" component with code purchase_price
 * - taxes: every "tax" component, percentage from its factor
 * - discounts: at most one unit-level "discount" component per line
 */

import { ValidationError } from '../errors/sync.js';
import type { MonetaryComponent } from '../schemas/extensions.js';
import type { InvoiceDiscount, TaxData } from '../schemas/erpRequests.js';
import { PRICE_CODES } from './constants.js';

type Components = readonly MonetaryComponent[] | null | undefined;

export interface BasePriceOptions {
  /** Throw instead of defaulting to "0" when no base component exists */
  strict?: boolean;
}

export function getBasePrice(components: Components, options: BasePriceOptions = {}): string {
  const base = components?.find((c) => c.monetaryComponentType === 'base');
  if (base?.amount != null) return base.amount;
  if (options.strict) {
    throw new ValidationError('Base price not found');
  }
  return '0';
}

function getInformationalAmount(components: Components, code: string): string {
  const match = components?.find(
    (c) => c.monetaryComponentType === 'informational' && c.code?.code === code
  );
  return match?.amount ?? '0';
}

export function getPurchasePrice(components: Components): string {
  return getInformationalAmount(components, PRICE_CODES.purchasePrice);
}

export function getTaxes(components: Components): TaxData[] {
  return (components ?? [])
    .filter((c) => c.monetaryComponentType === 'tax')
    .map((tax) => {
      const name = tax.code?.display ?? '';
      if (tax.factor === null) {
        throw new ValidationError(`Tax component "${name}" has no factor`);
      }
      return { tax_name: name, tax_percentage: Number(tax.factor) };
    });
}

/**
 * Discounts of one invoice line.
 *
 * The unit-level component gives the type and rate; the total-level
 * component with the same code gives the realized amount.
 *
 * @returns null when the line has no discount
 * @throws ValidationError when the line carries more than one discount
 */
export function getAllDiscounts(unitComponents: Components, totalComponents: Components): InvoiceDiscount[] | null {
  const unitDiscounts = (unitComponents ?? []).filter((c) => c.monetaryComponentType === 'discount');
  if (unitDiscounts.length === 0) return null;

  if (unitDiscounts.length > 1) {
    throw new ValidationError(
      `More than 1 discount per item is not allowed. Found ${unitDiscounts.length} discounts.`
    );
  }

  return unitDiscounts.map((discount): InvoiceDiscount => {
    const code = discount.code?.code ?? '';
    const name = discount.code?.display ?? '';
    const realized = (totalComponents ?? []).find(
      (c) => c.monetaryComponentType === 'discount' && c.code?.code === code
    );

    const isFactor = discount.factor !== null;
    return {
      name,
      discount_group: { x_care_id: code, name },
      discount_type: isFactor ? 'factor' : 'amount',
      rate: Number((isFactor ? discount.factor : discount.amount) ?? '0'),
      disc_amt: Number(realized?.amount ?? '0'),
    };
  });
}

/** Float conversion for ERP fields typed as numbers; "" and null become 0 */
export function toAmount(value: string | null | undefined): number {
  if (!value) return 0;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`Invalid amount "${value}"`);
  }
  return parsed;
}

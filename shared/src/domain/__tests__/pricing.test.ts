/**
 * Unit tests for price component extraction (shared domain)
 */

import { getAllDiscounts, getBasePrice, getPurchasePrice, getTaxes, toAmount } from '../pricing.js';
import { ValidationError } from '../../errors/index.js';
import { component } from '../../testing/fixtures.js';

describe('getBasePrice', () => {
    const withBase = [component('informational', { code: 'mrp', amount: '300' }), component('base', { amount: '250.00' })];
    const withoutBase = [component('informational', { code: 'mrp', amount: '300' })];

    it('returns the amount of the base component', () => {
        expect(getBasePrice(withBase)).toBe('250.00');
        expect(getBasePrice(withBase, { strict: true })).toBe('250.00');
    });

    it('defaults to "0" when lenient and no base component exists', () => {
        expect(getBasePrice(withoutBase)).toBe('0');
        expect(getBasePrice([])).toBe('0');
        expect(getBasePrice(null)).toBe('0');
    });

    it('throws when strict and no base component exists', () => {
        expect(() => getBasePrice(withoutBase, { strict: true })).toThrow(ValidationError);
        expect(() => getBasePrice([], { strict: true })).toThrow('Base price not found');
    });
});

describe('getPurchasePrice', () => {
    const components = [
        component('base', { amount: '250' }),
        component('informational', { code: 'purchase_price', amount: '120.50' }),
        component('informational', { code: 'mrp', amount: '275' }),
    ];

    it('reads informational components by code', () => {
        expect(getPurchasePrice(components)).toBe('120.50');
    });

    it('returns "0" when the code is absent', () => {
        const baseOnly = [component('base', { amount: '250' })];
        expect(getPurchasePrice(baseOnly)).toBe('0');
        expect(getPurchasePrice(undefined)).toBe('0');
    });

    it('ignores non-informational components with the same code', () => {
        expect(getPurchasePrice([component('surcharge', { code: 'purchase_price', amount: '99' })])).toBe('0');
    });
});

describe('getTaxes', () => {
    it('collects every tax component with its factor as percentage', () => {
        const taxes = getTaxes([
            component('base', { amount: '100' }),
            component('tax', { code: 'cgst', display: 'CGST 6%', factor: '6' }),
            component('tax', { code: 'sgst', display: 'SGST 6%', factor: '6.0' }),
        ]);
        expect(taxes).toEqual([
            { tax_name: 'CGST 6%', tax_percentage: 6 },
            { tax_name: 'SGST 6%', tax_percentage: 6 },
        ]);
    });

    it('returns an empty list without tax components', () => {
        expect(getTaxes([component('base', { amount: '100' })])).toEqual([]);
    });

    it('rejects a tax component without a factor', () => {
        expect(() => getTaxes([component('tax', { code: 'gst', display: 'GST', amount: '12' })])).toThrow(
            'Tax component "GST" has no factor'
        );
    });
});

describe('getAllDiscounts', () => {
    it('returns null when the line has no discount', () => {
        expect(getAllDiscounts([component('base', { amount: '100' })], [])).toBeNull();
        expect(getAllDiscounts(null, null)).toBeNull();
    });

    it('uses the factor type when the unit discount carries a factor', () => {
        const discounts = getAllDiscounts(
            [component('base', { amount: '250' }), component('discount', { code: 'staff', display: 'Staff Discount', factor: '10' })],
            [component('discount', { code: 'staff', display: 'Staff Discount', amount: '25' })]
        );
        expect(discounts).toEqual([
            {
                name: 'Staff Discount',
                discount_group: { x_care_id: 'staff', name: 'Staff Discount' },
                discount_type: 'factor',
                rate: 10,
                disc_amt: 25,
            },
        ]);
    });

    it('uses the amount type when the unit discount has no factor', () => {
        const discounts = getAllDiscounts(
            [component('discount', { code: 'promo', display: 'Camp Offer', amount: '50' })],
            [component('discount', { code: 'promo', display: 'Camp Offer', amount: '100' })]
        );
        expect(discounts?.[0].discount_type).toBe('amount');
        expect(discounts?.[0].rate).toBe(50);
        expect(discounts?.[0].disc_amt).toBe(100);
    });

    it('defaults the realized amount to 0 without a matching total component', () => {
        const discounts = getAllDiscounts(
            [component('discount', { code: 'promo', display: 'Camp Offer', amount: '50' })],
            [component('discount', { code: 'other', amount: '100' })]
        );
        expect(discounts?.[0].disc_amt).toBe(0);
    });

    it('rejects more than one discount on a line', () => {
        const unit = [
            component('discount', { code: 'staff', factor: '10' }),
            component('discount', { code: 'promo', amount: '50' }),
        ];
        expect(() => getAllDiscounts(unit, [])).toThrow(ValidationError);
        expect(() => getAllDiscounts(unit, [])).toThrow(
            'More than 1 discount per item is not allowed. Found 2 discounts.'
        );
    });
});

describe('toAmount', () => {
    it('converts decimal strings and treats empty values as zero', () => {
        expect(toAmount('120.50')).toBe(120.5);
        expect(toAmount('')).toBe(0);
        expect(toAmount(null)).toBe(0);
    });

    it('rejects non-numeric input', () => {
        expect(() => toAmount('abc')).toThrow('Invalid amount "abc"');
    });
});

import { readPaymentMethodLink, writePaymentMethodLink } from '../accountLink.js';

describe('payment method link', () => {
    it('reads positive integer ids and numeric strings', () => {
        expect(readPaymentMethodLink({ care_odoo: { method: 4 } }, 'care_odoo', 'method')).toBe(4);
        expect(readPaymentMethodLink({ care_odoo: { method: '12' } }, 'care_odoo', 'method')).toBe(12);
    });

    it('reads anything else as unlinked', () => {
        expect(readPaymentMethodLink({}, 'care_odoo', 'method')).toBeNull();
        expect(readPaymentMethodLink({ care_odoo: 'x' }, 'care_odoo', 'method')).toBeNull();
        expect(readPaymentMethodLink({ care_odoo: { method: 0 } }, 'care_odoo', 'method')).toBeNull();
        expect(readPaymentMethodLink({ care_odoo: { method: 'abc' } }, 'care_odoo', 'method')).toBeNull();
    });

    it('sets the id without touching other meta', () => {
        const meta = { other: { flag: true }, care_odoo: { note: 'x' } };

        expect(writePaymentMethodLink(meta, 'care_odoo', 'method', 7)).toEqual({
            other: { flag: true },
            care_odoo: { note: 'x', method: 7 },
        });
        expect(meta).toEqual({ other: { flag: true }, care_odoo: { note: 'x' } });
    });

    it('drops the namespace when the last key is removed', () => {
        expect(writePaymentMethodLink({ care_odoo: { method: 7 } }, 'care_odoo', 'method', null)).toEqual({});
        expect(writePaymentMethodLink({ care_odoo: { method: 7, note: 'x' } }, 'care_odoo', 'method', null)).toEqual({
            care_odoo: { note: 'x' },
        });
    });
});

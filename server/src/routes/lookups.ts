/**
 * ERP Lookup Routes
 *
 * Read-only searches the host UI runs against the ERP: sponsors,
 * insurance companies, payment methods and payment method lines.
 * The ERP takes the search parameters as a JSON body on GET.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { z } from 'zod';
import {
    ERP_ENDPOINTS,
    ErpCashReplySchema,
    InsuranceCompanyDataSchema,
    PaymentMethodDataSchema,
    PaymentMethodLineDataSchema,
    PaymentMethodLineQuerySchema,
    SearchQuerySchema,
    SponsorDataSchema,
} from '@care-erp/shared';
import { asyncHandler, typedRoute } from '../middleware/asyncHandler.js';
import type { ErpRpc } from '../services/erp/client.js';
import { listField, relay } from '../services/erp/relay.js';
import { NotFoundError } from '../utils/errors.js';

export interface LookupRouteDeps {
    erp: ErpRpc;
}

interface SearchLookup {
    path: string;
    endpoint: string;
    /** Field of the ERP reply holding the results */
    field: string;
    what: string;
    schema: z.ZodType<unknown>;
}

const SEARCHES: SearchLookup[] = [
    { path: '/sponsor', endpoint: ERP_ENDPOINTS.sponsorSearch, field: 'sponsors', what: 'sponsors', schema: SponsorDataSchema },
    {
        path: '/insurance-company',
        endpoint: ERP_ENDPOINTS.insuranceCompanySearch,
        field: 'insurance_companies',
        what: 'insurance companies',
        schema: InsuranceCompanyDataSchema,
    },
    {
        path: '/payment-method',
        endpoint: ERP_ENDPOINTS.paymentMethodSearch,
        field: 'payment_methods',
        what: 'payment methods',
        schema: PaymentMethodDataSchema,
    },
];

export function createLookupRouter({ erp }: LookupRouteDeps): Router {
    const router: Router = Router();

    /**
     * GET /api/sponsor?search_key=
     * GET /api/insurance-company?search_key=
     * GET /api/payment-method?search_key=
     */
    for (const lookup of SEARCHES) {
        router.get(lookup.path, typedRoute(SearchQuerySchema, 'query', async (query, _req, res) => {
            const results = await relay(
                erp,
                { endpoint: lookup.endpoint, payload: { search_key: query.search_key }, method: 'GET' },
                `Error fetching ${lookup.what} from ERP`,
                (reply) => listField(reply, lookup.field).map((entry) => lookup.schema.parse(entry)),
            );
            res.json(results);
        }));
    }

    /**
     * GET /api/payment-method-line?journal_type=credit
     * Payment method lines of the journals with that connector code
     */
    router.get('/payment-method-line', typedRoute(PaymentMethodLineQuerySchema, 'query', async (query, _req, res) => {
        const lines = await relay(
            erp,
            { endpoint: ERP_ENDPOINTS.paymentMethodLines, payload: { journal_type: query.journal_type }, method: 'GET' },
            'Error fetching payment method lines from ERP',
            (reply) => listField(reply, 'payment_methods').map((entry) => PaymentMethodLineDataSchema.parse(entry)),
        );
        res.json(lines);
    }));

    /**
     * GET /api/payment-method-line/:id
     */
    router.get('/payment-method-line/:id', asyncHandler(async (req: Request, res: Response) => {
        const { id } = req.params;
        const line = await relay(
            erp,
            { endpoint: `${ERP_ENDPOINTS.paymentMethodLines}/${encodeURIComponent(id)}`, method: 'GET' },
            'Error fetching payment method line from ERP',
            (reply) => {
                const found = ErpCashReplySchema.parse(reply).payment_method;
                if (!found) {
                    throw new NotFoundError(`ERP payment method line with ID ${id} not found`, 'PaymentMethodLine', id);
                }
                return PaymentMethodLineDataSchema.parse(found);
            },
        );
        res.json(line);
    }));

    return router;
}

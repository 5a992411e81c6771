/**
 * Centralized Environment Variable Validation
 *
 * Validates every environment variable at startup using Zod and turns the
 * result into one immutable PluginConfig. Nothing below the bootstrap
 * reads process.env; the config value is passed through constructors.
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with a JSDoc comment
 * 2. Map it onto PluginConfig in buildPluginConfig()
 */

// Load dotenv FIRST - must happen before we access process.env
// This is necessary because ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';
import type { ErpConnectionConfig, PluginConfig } from './pluginConfig.js';
import { freezeConfig } from './pluginConfig.js';

// ============================================
// SCHEMA DEFINITION
// ============================================

const csvList = z
    .string()
    .default('')
    .transform((value) =>
        value
            .split(',')
            .map((item) => item.trim())
            .filter(Boolean)
    );

const optionalString = z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value.trim() : null));

export const envSchema = z.object({
    // ----------------------------------------
    // ERP CONNECTION - required
    // ----------------------------------------

    /** ERP host name, without protocol */
    ERP_HOST: z.string().min(1, 'ERP_HOST is required'),

    /** ERP port; omitted from the URL when unset */
    ERP_PORT: z.coerce.number().int().positive().optional(),

    /** http or https */
    ERP_PROTOCOL: z.enum(['http', 'https']).default('https'),

    /** ERP database, sent as the `db` header */
    ERP_DATABASE: z.string().min(1, 'ERP_DATABASE is required'),

    /** Basic auth user */
    ERP_USERNAME: z.string().min(1, 'ERP_USERNAME is required'),

    /** Basic auth password */
    ERP_PASSWORD: z.string().min(1, 'ERP_PASSWORD is required'),

    /** Per-request timeout */
    ERP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

    // ----------------------------------------
    // SYNC BEHAVIOUR
    // ----------------------------------------

    /** Supplier organizations (external ids) whose delivery orders are never billed */
    INTERNAL_SUPPLIER_IDS: csvList,

    /** Delay before the first existence check after an invoice/payment sync */
    RECONCILIATION_DELAY_SECONDS: z.coerce.number().min(0).default(60),

    /** Delay between the first and the second existence check */
    RECONCILIATION_RECHECK_DELAY_SECONDS: z.coerce.number().min(0).default(5),

    /** Retries of a reconciliation job after a connection failure */
    RECONCILIATION_MAX_RETRIES: z.coerce.number().int().min(0).default(3),

    /** Fixed backoff between reconciliation retries */
    RECONCILIATION_RETRY_DELAY_SECONDS: z.coerce.number().min(0).default(10),

    /** How often the reconciliation worker polls for due jobs */
    RECONCILIATION_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),

    /** A job stuck mid-run this long (its worker died) is claimed again */
    RECONCILIATION_LEASE_SECONDS: z.coerce.number().int().positive().default(300),

    /** Key under the plugin meta namespace of an account holding the ERP payment method id */
    ACCOUNT_PAYMENT_METHOD_KEY: z.string().min(1).default('odoo_payment_method_id'),

    /** Namespace of this plugin inside an account's meta map */
    PLUGIN_META_NAMESPACE: z.string().min(1).default('care_odoo'),

    /** External id of the tag marking insured accounts */
    INSURANCE_TAG_ID: optionalString,

    /** Key of the insurance company id inside the account extension */
    INSURANCE_EXTENSION_NAME: optionalString,

    /** Identifier config whose value is sent as the invoice x_identifier */
    PATIENT_IDENTIFIER_CONFIG_ID: optionalString,

    /** State used when a partner has none */
    DEFAULT_PARTNER_STATE: z.string().min(1).default('kerala'),

    // ----------------------------------------
    // HOST
    // ----------------------------------------

    /** PostgreSQL connection string of the host database */
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),

    /** Secret the host signs its bearer tokens with */
    JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Server port */
    PORT: z.coerce.number().int().positive().default(3010),

    /** Disable the reconciliation worker (e.g. for a CLI-only process) */
    DISABLE_BACKGROUND_WORKERS: z.enum(['true', 'false']).default('false'),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Parse the environment or exit.
 *
 * Logs every failing variable before exiting so a misconfigured deployment
 * shows all problems at once.
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const result = envSchema.safeParse(source);
    if (result.success) return result.data;

    const issues = result.error.issues
        .map((issue) => {
            const path = issue.path.join('.');
            return `  - ${path}: ${issue.message}`;
        })
        .join('\n');

    console.error('Environment validation failed:\n' + issues);
    process.exit(1);
}

// ============================================
// ERP CONNECTION ONLY
// ============================================

/** Settings without which no ERP call can be made */
export const ERP_REQUIRED_SETTINGS = ['ERP_HOST', 'ERP_DATABASE', 'ERP_USERNAME', 'ERP_PASSWORD'] as const;

/** The connection subset, for tools that talk to the ERP without a host database */
export const erpEnvSchema = envSchema.pick({
    ERP_HOST: true,
    ERP_PORT: true,
    ERP_PROTOCOL: true,
    ERP_DATABASE: true,
    ERP_USERNAME: true,
    ERP_PASSWORD: true,
    ERP_TIMEOUT_MS: true,
});

export type ErpEnv = z.infer<typeof erpEnvSchema>;

export function buildErpConfig(env: ErpEnv): ErpConnectionConfig {
    return {
        host: env.ERP_HOST,
        port: env.ERP_PORT ?? null,
        protocol: env.ERP_PROTOCOL,
        database: env.ERP_DATABASE,
        username: env.ERP_USERNAME,
        password: env.ERP_PASSWORD,
        timeoutMs: env.ERP_TIMEOUT_MS,
    };
}

export function buildPluginConfig(env: Env): PluginConfig {
    return freezeConfig({
        erp: buildErpConfig(env),
        internalSupplierIds: env.INTERNAL_SUPPLIER_IDS,
        reconciliation: {
            delaySeconds: env.RECONCILIATION_DELAY_SECONDS,
            recheckDelaySeconds: env.RECONCILIATION_RECHECK_DELAY_SECONDS,
            maxRetries: env.RECONCILIATION_MAX_RETRIES,
            retryDelaySeconds: env.RECONCILIATION_RETRY_DELAY_SECONDS,
            pollIntervalMs: env.RECONCILIATION_POLL_INTERVAL_MS,
            leaseSeconds: env.RECONCILIATION_LEASE_SECONDS,
        },
        accountPaymentMethodKey: env.ACCOUNT_PAYMENT_METHOD_KEY,
        pluginMetaNamespace: env.PLUGIN_META_NAMESPACE,
        insuranceTagId: env.INSURANCE_TAG_ID,
        insuranceExtensionName: env.INSURANCE_EXTENSION_NAME,
        patientIdentifierConfigId: env.PATIENT_IDENTIFIER_CONFIG_ID,
        defaultPartnerState: env.DEFAULT_PARTNER_STATE,
    });
}

/**
 * Plugin configuration value
 *
 * Built once from the environment (see env.ts) and frozen. Every service
 * receives the slice it needs through its constructor.
 */

export interface ErpConnectionConfig {
    host: string;
    port: number | null;
    protocol: 'http' | 'https';
    database: string;
    username: string;
    password: string;
    timeoutMs: number;
}

export interface ReconciliationConfig {
    /** Delay before the first existence check */
    delaySeconds: number;
    /** Delay before the second existence check */
    recheckDelaySeconds: number;
    /** Retries after a connection failure; other failures are final */
    maxRetries: number;
    retryDelaySeconds: number;
    pollIntervalMs: number;
    /** How long a running job may go without a state write before another poll claims it */
    leaseSeconds: number;
}

export interface PluginConfig {
    erp: ErpConnectionConfig;
    internalSupplierIds: readonly string[];
    reconciliation: ReconciliationConfig;
    accountPaymentMethodKey: string;
    pluginMetaNamespace: string;
    insuranceTagId: string | null;
    insuranceExtensionName: string | null;
    patientIdentifierConfigId: string | null;
    defaultPartnerState: string;
}

export function freezeConfig(config: PluginConfig): Readonly<PluginConfig> {
    Object.freeze(config.erp);
    Object.freeze(config.reconciliation);
    Object.freeze(config.internalSupplierIds);
    return Object.freeze(config);
}

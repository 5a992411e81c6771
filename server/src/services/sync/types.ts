/**
 * Sync Resource Types
 */

import type { PluginConfig } from '../../config/pluginConfig.js';
import type { HostRepository } from '../../repositories/hostRepository.js';
import type { ErpRpc } from '../erp/client.js';

/** What every sync resource needs: the ERP, host storage and config */
export interface SyncDeps {
    erp: ErpRpc;
    repository: HostRepository;
    config: PluginConfig;
}

/** ERP record id, or null when the sync was skipped or the ERP did not report one */
export type ErpId = number | null;

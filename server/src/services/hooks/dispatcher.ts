/**
 * Sync Event Dispatcher
 *
 * Synchronous command dispatch for host saves. The host calls
 * `beforeSave` ahead of its write (to capture the persisted status) and
 * `afterSave` once the row is written; handlers run inline and their
 * errors propagate back into the host's write.
 *
 * @example
 * const event = await dispatcher.beforeSave({ entity: 'invoice', externalId, status: 'cancelled' });
 * await db.save(invoice);
 * await dispatcher.afterSave(event);
 */

import { SyncEventSchema } from '@care-erp/shared';
import type { SyncEvent, SyncEventInput } from '@care-erp/shared';
import type { HostRepository } from '../../repositories/hostRepository.js';
import { hookLogger } from '../../utils/logger.js';
import { classify } from './transitions.js';
import type { EventByKey, TransitionKey } from './transitions.js';

export type HookHandler<K extends TransitionKey> = (event: EventByKey[K]) => Promise<void>;

type HandlerMap = { [K in TransitionKey]: Array<HookHandler<K>> };

function emptyHandlers(): HandlerMap {
    return {
        'user.saved': [],
        'invoice.issued': [],
        'invoice.cancelled': [],
        'payment_reconciliation.active': [],
        'payment_reconciliation.cancelled': [],
        'charge_item_definition.saved': [],
        'resource_category.saved': [],
        'organization.saved': [],
        'delivery_order.completed': [],
        'product.saved': [],
    };
}

export class SyncEventDispatcher {
    private readonly handlers: HandlerMap = emptyHandlers();

    constructor(private readonly repository: Pick<HostRepository, 'findInvoiceStatus' | 'findPaymentStatus'>) {}

    on<K extends TransitionKey>(key: K, handler: HookHandler<K>): this {
        this.handlers[key].push(handler);
        return this;
    }

    /**
     * Validate the event and attach the persisted status as `previousStatus`
     * when the caller did not supply one.
     */
    async beforeSave(input: SyncEventInput): Promise<SyncEvent> {
        const event = SyncEventSchema.parse(input);
        if (event.created) return event;

        if (event.entity === 'invoice' && event.previousStatus === null) {
            return { ...event, previousStatus: await this.repository.findInvoiceStatus(event.externalId) };
        }
        if (event.entity === 'payment_reconciliation' && event.previousStatus === null) {
            return { ...event, previousStatus: await this.repository.findPaymentStatus(event.externalId) };
        }
        return event;
    }

    /**
     * Run the handlers of every transition the saved record triggers.
     * Returns the keys that ran.
     */
    async afterSave(event: SyncEvent): Promise<TransitionKey[]> {
        const transitions = classify(event);
        if (transitions.length === 0) {
            hookLogger.debug({ entity: event.entity, externalId: event.externalId }, 'No sync transition');
            return [];
        }

        for (const transition of transitions) {
            hookLogger.debug({ key: transition.key, externalId: event.externalId }, 'Dispatching sync transition');
            await this.run(transition.key, transition.event);
        }
        return transitions.map((transition) => transition.key);
    }

    /**
     * Both phases for a host that reports its save after the fact.
     * The event must carry `previousStatus` itself.
     */
    async dispatch(input: SyncEventInput): Promise<TransitionKey[]> {
        return this.afterSave(SyncEventSchema.parse(input));
    }

    private async run<K extends TransitionKey>(key: K, event: EventByKey[K]): Promise<void> {
        const handlers: Array<HookHandler<K>> = this.handlers[key];
        for (const handler of handlers) {
            await handler(event);
        }
    }
}

export { SyncEventDispatcher } from './dispatcher.js';
export type { HookHandler } from './dispatcher.js';
export { registerSyncHandlers } from './handlers.js';
export { classify, isNumberWriteBack } from './transitions.js';
export type { EventByKey, Transition, TransitionKey } from './transitions.js';

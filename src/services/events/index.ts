export { SqliteEventStore } from './sqlite-store.js';
export type { EventStore, InteractionRecord, NewInteractionRecord } from './types.js';

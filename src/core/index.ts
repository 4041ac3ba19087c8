export * from "./impl/index.js";
export { QueueError, isQueueError, queueError, type QueueErrorCode, type QueueErrorParams } from "./errors.js";
export type { Heap } from "./heap.js";
export type { Order, OrderKind } from "./order.js";
export type { Item, Orderable, QueueOptions, SortingKey } from "./types.js";

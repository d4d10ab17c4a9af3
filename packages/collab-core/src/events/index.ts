/**
 * Events Module
 */

export type * from "./types";
export { EventBus, type EventBusConfig } from "./eventBus";

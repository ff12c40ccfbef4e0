export * from "./compare";
export * from "./cursors";
export * from "./errors";
export { setDebugAssertions } from "./internal/debug";
export * from "./iterators";
export * from "./linked_vec";
export type { PayloadRef } from "./payload_ref";
export * from "./store_index";

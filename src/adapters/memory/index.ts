export { createMemoryClusterClient } from "./adapter";
export type { MemoryClusterClient, MemoryClusterFailures, MemoryClusterSnapshot } from "./adapter";

export { type MemoryAdapter, memoryAdapter } from "./adapter.js";

export { FileSubscriberStore } from "./file-store.js";
export { MemorySubscriberStore } from "./memory-store.js";

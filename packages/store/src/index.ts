export * from "./types.js"
export * from "./errors.js"
export * from "./config.js"
export * from "./message.js"
export * from "./mutations.js"
export { decodeRow, encodeMessage, encodeTimestamp, decodeTimestamp, getSchema, getSnapshotQuery } from "./encoding.js"
export * from "./WriteSequencer.js"
export * from "./SnapshotRepository.js"
export * from "./MessageStore.js"

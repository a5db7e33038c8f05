export * from "./assert.js"
export * from "./signalInvalidType.js"
export * from "./Result.js"
export * from "./CacheMap.js"
export * from "./types.js"

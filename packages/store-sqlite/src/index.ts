export * from "./SqliteGateway.js"
export * from "./errors.js"
export { identifierPattern, quote, isConflictAlgorithm, conflictAlgorithms, isRow } from "./utils.js"

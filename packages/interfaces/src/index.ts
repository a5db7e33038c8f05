export * from "./requests.js"
export * from "./StorageGateway.js"

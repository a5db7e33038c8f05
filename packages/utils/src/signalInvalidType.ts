/** Exhaustiveness check for tagged unions; reaching it at runtime means a caller bypassed the types. */
export function signalInvalidType(value: never): never {
	throw new TypeError(`internal error: invalid type ${JSON.stringify(value)}`)
}

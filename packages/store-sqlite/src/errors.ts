export class StorageError extends Error {
	public static code = "STORAGE_FAILED"
	public readonly code = StorageError.code

	constructor(public readonly operation: string, cause: unknown) {
		super(`${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause })
	}
}

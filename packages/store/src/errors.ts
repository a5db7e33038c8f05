export class DecodeError extends Error {
	public static code = "DECODE_FAILED"
	public readonly code = DecodeError.code

	constructor(public readonly column: string, public readonly row: Record<string, unknown>) {
		super(`invalid value for column ${column}`)
	}
}

export class ClosedError extends Error {
	public static code = "STORE_CLOSED"
	public readonly code = ClosedError.code

	constructor() {
		super("message store is closed")
	}
}

export class ValidationError extends Error {
	public static code = "INVALID_MESSAGE"
	public readonly code = ValidationError.code

	constructor(message: string) {
		super(message)
	}
}

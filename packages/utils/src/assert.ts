export class AssertError extends Error {
	public static code = "ASSERTION_FAILED"
	public readonly code = AssertError.code

	constructor(message: string, public readonly props?: Record<string, unknown>) {
		super(message)
	}
}

export function assert(
	condition: unknown,
	message = "assertion failed",
	props?: Record<string, unknown>,
): asserts condition {
	if (!condition) {
		throw new AssertError(message, props)
	}
}

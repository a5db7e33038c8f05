export type Result<T, E extends Error = Error> = { ok: true; value: T } | { ok: false; error: E }

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value })

export const failure = <E extends Error>(error: E): { ok: false; error: E } => ({ ok: false, error })

/**
 * Coerce anything thrown into an Error so it can be carried by a failed Result.
 */
export function toError(err: unknown): Error {
	if (err instanceof Error) {
		return err
	} else {
		return new Error(String(err))
	}
}

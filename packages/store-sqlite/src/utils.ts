import type { ConflictAlgorithm, Row, SqlValue } from "@msgstore/interfaces"
import { assert } from "@msgstore/utils"

export const identifierPattern = /^[a-zA-Z_][a-zA-Z0-9_]*$/

export function quote(name: string) {
	assert(identifierPattern.test(name), `invalid identifier ${JSON.stringify(name)}`)
	return `"${name}"`
}

const conflictClauses = {
	abort: " OR ABORT",
	fail: " OR FAIL",
	ignore: " OR IGNORE",
	replace: " OR REPLACE",
	rollback: " OR ROLLBACK",
} satisfies Record<ConflictAlgorithm, string>

export const conflictAlgorithms = Object.keys(conflictClauses)

export const isConflictAlgorithm = (value: unknown): value is ConflictAlgorithm =>
	typeof value === "string" && Object.hasOwn(conflictClauses, value)

export const getConflictClause = (conflictAlgorithm?: ConflictAlgorithm) =>
	conflictAlgorithm === undefined ? "" : conflictClauses[conflictAlgorithm]

export function isSqlValue(value: unknown): value is SqlValue {
	switch (typeof value) {
		case "string":
		case "number":
		case "bigint":
			return true
		case "object":
			return value === null || value instanceof Uint8Array
		default:
			return false
	}
}

export function isRow(value: unknown): value is Row {
	if (typeof value !== "object" || value === null) {
		return false
	}

	return Object.values(value).every(isSqlValue)
}

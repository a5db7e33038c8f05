export type SqlValue = string | number | bigint | Uint8Array | null

export type Row = Record<string, SqlValue>

/** SQLite's `OR <algorithm>` conflict resolution for inserts and updates */
export type ConflictAlgorithm = "abort" | "fail" | "ignore" | "replace" | "rollback"

export type SqlInsertRequest = {
	table: string
	values: Record<string, SqlValue>
	conflictAlgorithm?: ConflictAlgorithm
}

export type SqlUpdateRequest = {
	table: string
	values: Record<string, SqlValue>
	where: string
	args?: SqlValue[]
	conflictAlgorithm?: ConflictAlgorithm
}

/** a delete without a `where` clause removes every row of the table */
export type SqlDeleteRequest = {
	table: string
	where?: string
	args?: SqlValue[]
}

export type SqlRequest = {
	sql: string
	args?: SqlValue[]
}

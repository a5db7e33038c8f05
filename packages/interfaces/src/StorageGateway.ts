import type { Awaitable, Result } from "@msgstore/utils"

import type { Row, SqlDeleteRequest, SqlInsertRequest, SqlRequest, SqlUpdateRequest } from "./requests.js"

/**
 * A StorageGateway applies single statements to a relational store.
 * Failures are reported as failed results, never thrown.
 */
export interface StorageGateway {
	/** @returns the row id of the inserted row */
	insert(request: SqlInsertRequest): Awaitable<Result<number>>

	/** @returns the number of rows affected */
	update(request: SqlUpdateRequest): Awaitable<Result<number>>

	/** @returns the number of rows affected */
	delete(request: SqlDeleteRequest): Awaitable<Result<number>>

	query(request: SqlRequest): Awaitable<Result<Row[]>>

	close(): Awaitable<void>
}

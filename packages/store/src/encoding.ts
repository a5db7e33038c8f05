import type {
	ConflictAlgorithm,
	Row,
	SqlDeleteRequest,
	SqlInsertRequest,
	SqlRequest,
	SqlUpdateRequest,
	SqlValue,
} from "@msgstore/interfaces"
import { quote } from "@msgstore/store-sqlite"
import { Result, assert, failure, ok } from "@msgstore/utils"

import { DecodeError } from "./errors.js"
import { freezeMessage } from "./message.js"
import type { Direction, Message } from "./types.js"

export const ID_COLUMN = "id"
export const CONTENT_COLUMN = "content"
export const FROM_USER_ID_COLUMN = "from_user_id"
export const TO_USER_ID_COLUMN = "to_user_id"
export const CREATED_AT_COLUMN = "created_at"

/** Number.MAX_SAFE_INTEGER has 16 digits */
export const TIMESTAMP_WIDTH = 16

const MODIFY_WHERE = `${ID_COLUMN} = ?`

export const getSchema = (table: string) => [
	`CREATE TABLE IF NOT EXISTS ${quote(table)} (
		${ID_COLUMN} TEXT PRIMARY KEY,
		${CONTENT_COLUMN} TEXT NOT NULL,
		${FROM_USER_ID_COLUMN} TEXT NOT NULL,
		${TO_USER_ID_COLUMN} TEXT NOT NULL,
		${CREATED_AT_COLUMN} TEXT NOT NULL
	)`,
	`CREATE INDEX IF NOT EXISTS ${quote(`${table}_${CREATED_AT_COLUMN}`)} ON ${quote(table)} (${CREATED_AT_COLUMN})`,
]

export const getSnapshotQuery = (table: string): SqlRequest => ({
	sql: `SELECT * FROM ${quote(table)} ORDER BY ${CREATED_AT_COLUMN}`,
})

// created_at is stored as zero-padded text so that text order matches numeric order

export function encodeTimestamp(createdAt: number): string {
	assert(Number.isSafeInteger(createdAt) && createdAt >= 0, "invalid timestamp", { createdAt })
	return createdAt.toString().padStart(TIMESTAMP_WIDTH, "0")
}

export function decodeTimestamp(value: string): number | null {
	if (!/^[0-9]+$/.test(value)) {
		return null
	}

	const createdAt = Number(value)
	return Number.isSafeInteger(createdAt) ? createdAt : null
}

export function encodeMessage(message: Message): Record<string, SqlValue> {
	return {
		[ID_COLUMN]: message.id,
		[CONTENT_COLUMN]: message.content.text,
		[FROM_USER_ID_COLUMN]: message.fromUserId,
		[TO_USER_ID_COLUMN]: message.toUserId,
		[CREATED_AT_COLUMN]: encodeTimestamp(message.createdAt),
	}
}

export const encodeInsert = (
	table: string,
	message: Message,
	conflictAlgorithm?: ConflictAlgorithm,
): SqlInsertRequest => ({ table, values: encodeMessage(message), conflictAlgorithm })

export function encodeUpdate(table: string, message: Message, conflictAlgorithm?: ConflictAlgorithm): SqlUpdateRequest {
	const { [ID_COLUMN]: id, ...values } = encodeMessage(message)
	return { table, values, where: MODIFY_WHERE, args: [id], conflictAlgorithm }
}

export const encodeDelete = (table: string, id: string): SqlDeleteRequest => ({
	table,
	where: MODIFY_WHERE,
	args: [id],
})

export const encodeClear = (table: string): SqlDeleteRequest => ({ table })

/**
 * Decode a row of the messages table. The content is `inbound` when the
 * message is addressed to the current user and `outbound` otherwise.
 */
export function decodeRow(row: Row, currentUserId: string): Result<Message, DecodeError> {
	const id = row[ID_COLUMN]
	if (typeof id !== "string") {
		return failure(new DecodeError(ID_COLUMN, row))
	}

	const text = row[CONTENT_COLUMN]
	if (typeof text !== "string") {
		return failure(new DecodeError(CONTENT_COLUMN, row))
	}

	const fromUserId = row[FROM_USER_ID_COLUMN]
	if (typeof fromUserId !== "string") {
		return failure(new DecodeError(FROM_USER_ID_COLUMN, row))
	}

	const toUserId = row[TO_USER_ID_COLUMN]
	if (typeof toUserId !== "string") {
		return failure(new DecodeError(TO_USER_ID_COLUMN, row))
	}

	const createdAtValue = row[CREATED_AT_COLUMN]
	const createdAt = typeof createdAtValue === "string" ? decodeTimestamp(createdAtValue) : null
	if (createdAt === null) {
		return failure(new DecodeError(CREATED_AT_COLUMN, row))
	}

	const direction: Direction = toUserId === currentUserId ? "inbound" : "outbound"
	return ok(freezeMessage({ id, fromUserId, toUserId, content: { direction, text }, createdAt }))
}

import type { ConflictAlgorithm, StorageGateway } from "@msgstore/interfaces"
import { conflictAlgorithms, identifierPattern, isConflictAlgorithm } from "@msgstore/store-sqlite"
import { assert } from "@msgstore/utils"

export interface MessageStoreInit {
	/** identity that decides whether a loaded message is inbound or outbound */
	currentUserId: string

	/** SQLite database file; `null` (the default) keeps everything in memory */
	path?: string | null
	table?: string
	conflictAlgorithm?: ConflictAlgorithm

	/**
	 * Use an existing gateway instead of opening a SQLite database.
	 * The gateway must already have the messages table.
	 */
	gateway?: StorageGateway
}

export type StoreConfig = {
	currentUserId: string
	path: string | null
	table: string
	conflictAlgorithm: ConflictAlgorithm
}

export const defaultConfig = {
	path: null,
	table: "messages",
	conflictAlgorithm: "abort",
} satisfies Omit<StoreConfig, "currentUserId">

export function parseConfig(init: MessageStoreInit): StoreConfig {
	const {
		currentUserId,
		path = defaultConfig.path,
		table = defaultConfig.table,
		conflictAlgorithm = defaultConfig.conflictAlgorithm,
	} = init

	assert(typeof currentUserId === "string" && currentUserId.length > 0, "currentUserId must be a non-empty string")
	assert(path === null || (typeof path === "string" && path.length > 0), "path must be null or a non-empty string")
	assert(identifierPattern.test(table), `invalid table name ${JSON.stringify(table)}`)
	assert(
		isConflictAlgorithm(conflictAlgorithm),
		`invalid conflict algorithm (expected one of ${conflictAlgorithms.join(", ")})`,
	)

	return { currentUserId, path, table, conflictAlgorithm }
}

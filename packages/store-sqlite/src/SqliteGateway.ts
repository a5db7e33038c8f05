import Database from "better-sqlite3"
import { logger } from "@libp2p/logger"

import type {
	Row,
	SqlDeleteRequest,
	SqlInsertRequest,
	SqlRequest,
	SqlUpdateRequest,
	SqlValue,
	StorageGateway,
} from "@msgstore/interfaces"
import { CacheMap, Result, assert, failure, ok } from "@msgstore/utils"

import { StorageError } from "./errors.js"
import { getConflictClause, isRow, quote } from "./utils.js"

export interface SqliteGatewayOptions {
	/** database file; `null` opens an in-memory database */
	path: string | null

	/** statements executed once after opening, e.g. CREATE TABLE IF NOT EXISTS */
	init?: string[]

	statementCacheSize?: number
}

export class SqliteGateway implements StorageGateway {
	public static defaultStatementCacheSize = 64

	public readonly db: Database.Database

	readonly #statements: CacheMap<string, Database.Statement>
	private readonly log = logger("msgstore:sqlite")

	constructor({ path, init = [], statementCacheSize = SqliteGateway.defaultStatementCacheSize }: SqliteGatewayOptions) {
		this.db = new Database(path ?? ":memory:")
		this.#statements = new CacheMap(statementCacheSize)
		this.log("opened %s", path ?? "in-memory database")

		for (const sql of init) {
			this.log.trace("executing %s", sql)
			this.db.exec(sql)
		}
	}

	public insert({ table, values, conflictAlgorithm }: SqlInsertRequest): Result<number, StorageError> {
		return this.#run("insert", () => {
			const entries = Object.entries(values)
			assert(entries.length > 0, "insert requires at least one column")

			const columns = entries.map(([name]) => quote(name)).join(", ")
			const params = entries.map(() => "?").join(", ")
			const { lastInsertRowid } = this.#prepare(
				`INSERT${getConflictClause(conflictAlgorithm)} INTO ${quote(table)} (${columns}) VALUES (${params})`,
			).run(...entries.map(([_, value]) => value))

			return Number(lastInsertRowid)
		})
	}

	public update({ table, values, where, args = [], conflictAlgorithm }: SqlUpdateRequest): Result<number> {
		return this.#run("update", () => {
			const entries = Object.entries(values)
			assert(entries.length > 0, "update requires at least one column")

			const assignments = entries.map(([name]) => `${quote(name)} = ?`).join(", ")
			const params: SqlValue[] = [...entries.map(([_, value]) => value), ...args]
			return this.#prepare(
				`UPDATE${getConflictClause(conflictAlgorithm)} ${quote(table)} SET ${assignments} WHERE ${where}`,
			).run(...params).changes
		})
	}

	public delete({ table, where, args = [] }: SqlDeleteRequest): Result<number> {
		return this.#run("delete", () => {
			const sql = where === undefined ? `DELETE FROM ${quote(table)}` : `DELETE FROM ${quote(table)} WHERE ${where}`
			return this.#prepare(sql).run(...args).changes
		})
	}

	public query({ sql, args = [] }: SqlRequest): Result<Row[]> {
		return this.#run("query", () => {
			const rows: Row[] = []
			for (const row of this.#prepare(sql).all(...args)) {
				assert(isRow(row), "unexpected row shape")
				rows.push(row)
			}

			return rows
		})
	}

	public close() {
		this.log("closing")
		this.#statements.clear()
		this.db.close()
	}

	#prepare(sql: string): Database.Statement {
		const cached = this.#statements.get(sql)
		if (cached !== undefined) {
			return cached
		}

		this.log.trace("preparing %s", sql)
		const statement = this.db.prepare(sql)
		this.#statements.set(sql, statement)
		return statement
	}

	#run<T>(operation: string, execute: () => T): Result<T, StorageError> {
		try {
			return ok(execute())
		} catch (err) {
			this.log.error("%s failed: %O", operation, err)
			return failure(new StorageError(operation, err))
		}
	}
}

import type {
	Row,
	SqlDeleteRequest,
	SqlInsertRequest,
	SqlRequest,
	SqlUpdateRequest,
	StorageGateway,
} from "@msgstore/interfaces"
import { SqliteGateway } from "@msgstore/store-sqlite"
import { getSchema } from "@msgstore/store"
import { Result, failure } from "@msgstore/utils"

export type Operation = "insert" | "update" | "delete" | "query"

/**
 * An in-memory SQLite gateway that records every call, can be told to fail
 * an operation, and can hold queries open with `onQuery`.
 */
export class FakeGateway implements StorageGateway {
	public readonly sqlite: SqliteGateway
	public readonly calls: string[] = []
	public readonly failing = new Set<Operation>()
	public onQuery: (() => Promise<void>) | null = null
	public closed = false

	constructor(table = "messages") {
		this.sqlite = new SqliteGateway({ path: null, init: getSchema(table) })
	}

	public get queryCount() {
		return this.calls.filter((call) => call === "query").length
	}

	public insert(request: SqlInsertRequest): Result<number> {
		this.calls.push(`insert ${String(request.values.id)}`)
		return this.failing.has("insert") ? failure(new Error("insert failed")) : this.sqlite.insert(request)
	}

	public update(request: SqlUpdateRequest): Result<number> {
		this.calls.push(`update ${String(request.args?.[0])}`)
		return this.failing.has("update") ? failure(new Error("update failed")) : this.sqlite.update(request)
	}

	public delete(request: SqlDeleteRequest): Result<number> {
		this.calls.push(request.where === undefined ? "clear" : `delete ${String(request.args?.[0])}`)
		return this.failing.has("delete") ? failure(new Error("delete failed")) : this.sqlite.delete(request)
	}

	public async query(request: SqlRequest): Promise<Result<Row[]>> {
		this.calls.push("query")
		if (this.onQuery !== null) {
			await this.onQuery()
		}

		return this.failing.has("query") ? failure(new Error("query failed")) : this.sqlite.query(request)
	}

	public close() {
		this.closed = true
		this.sqlite.close()
	}
}

export function defer() {
	let resolve: () => void = () => {}
	const promise = new Promise<void>((r) => {
		resolve = r
	})

	return { promise, resolve }
}

export const row = (id: string, text: string, from: string, to: string, createdAt: number) => ({
	id,
	content: text,
	from_user_id: from,
	to_user_id: to,
	created_at: createdAt.toString().padStart(16, "0"),
})

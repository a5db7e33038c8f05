import { logger } from "@libp2p/logger"
import type PQueue from "p-queue"

import type { Row, SqlRequest, StorageGateway } from "@msgstore/interfaces"
import { Result, failure, toError } from "@msgstore/utils"

import { decodeRow, getSnapshotQuery } from "./encoding.js"
import type { Message, Snapshot, SnapshotCallback, SnapshotObservable, Subscription } from "./types.js"

export interface SnapshotRepositoryInit {
	/** the executor shared with the WriteSequencer */
	executor: PQueue
	gateway: StorageGateway
	table: string
	currentUserId: string
}

type Reload = {
	controller: AbortController
	started: boolean
}

/**
 * SnapshotRepository caches the full, ordered message table.
 *
 * It only reloads while at least one observer is subscribed. At most one reload
 * is queued or running at a time; an invalidation that arrives while a reload is
 * running schedules a single follow-up, however many invalidations arrive.
 * Failed reloads keep the previous snapshot.
 */
export class SnapshotRepository implements SnapshotObservable {
	public static readonly initialValue: Snapshot = Object.freeze([])

	private readonly log = logger("msgstore:repository")
	private readonly executor: PQueue
	private readonly gateway: StorageGateway
	private readonly currentUserId: string
	private readonly query: SqlRequest

	readonly #observers = new Map<number, SnapshotCallback>()
	#observerId = 0

	#value: Snapshot = SnapshotRepository.initialValue
	#reload: Reload | null = null
	#followUp = false

	#reloadCount = 0
	#failureCount = 0

	public constructor({ executor, gateway, table, currentUserId }: SnapshotRepositoryInit) {
		this.executor = executor
		this.gateway = gateway
		this.currentUserId = currentUserId
		this.query = getSnapshotQuery(table)
	}

	public get value(): Snapshot {
		return this.#value
	}

	/** number of reload queries sent to the gateway */
	public get reloadCount() {
		return this.#reloadCount
	}

	public get failureCount() {
		return this.#failureCount
	}

	public isActive() {
		return this.#observers.size > 0
	}

	public subscribe(callback: SnapshotCallback): Subscription {
		const id = this.#observerId++
		this.#observers.set(id, callback)

		if (this.#observers.size === 1) {
			this.log("activating")
			this.#schedule()
		} else {
			const snapshot = this.#value
			queueMicrotask(() => {
				if (this.#observers.get(id) === callback) {
					this.#notify(callback, snapshot)
				}
			})
		}

		return { id, unsubscribe: () => this.unsubscribe(id) }
	}

	public unsubscribe(id: number) {
		if (!this.#observers.delete(id) || this.#observers.size > 0) {
			return
		}

		this.log("deactivating")
		this.#cancel()
	}

	/** Mark the snapshot as stale after a write. Ignored while nobody is subscribed. */
	public invalidate() {
		if (this.#observers.size === 0) {
			return
		}

		// a reload that is queued but not started runs after the write and already includes it
		if (this.#reload === null) {
			this.#schedule()
		} else if (this.#reload.started) {
			this.#followUp = true
		}
	}

	/** Drop every observer and cancel any pending reload. */
	public close() {
		this.#observers.clear()
		this.#cancel()
	}

	#cancel() {
		this.#reload?.controller.abort()
		this.#reload = null
		this.#followUp = false
	}

	#schedule() {
		const reload: Reload = { controller: new AbortController(), started: false }
		this.#reload = reload
		this.executor
			.add(() => this.#run(reload))
			.catch((err) => this.log.error("internal error during reload: %O", err))
	}

	async #run(reload: Reload) {
		await Promise.resolve()
		if (reload.controller.signal.aborted) {
			this.log("skipping cancelled reload")
			return
		}

		reload.started = true
		try {
			const result = await this.#fetch()
			if (reload.controller.signal.aborted) {
				this.log("discarding cancelled reload")
			} else if (result.ok) {
				this.#publish(result.value)
			} else {
				this.#failureCount++
				this.log.error("reload failed, keeping the previous snapshot: %O", result.error)
			}
		} finally {
			if (this.#reload === reload) {
				this.#reload = null
				if (this.#followUp) {
					this.#followUp = false
					this.#schedule()
				}
			}
		}
	}

	async #fetch(): Promise<Result<Snapshot>> {
		this.#reloadCount++

		let rows: Result<Row[]>
		try {
			rows = await this.gateway.query(this.query)
		} catch (err) {
			rows = failure(toError(err))
		}

		if (!rows.ok) {
			return rows
		}

		const messages: Message[] = []
		for (const row of rows.value) {
			const message = decodeRow(row, this.currentUserId)
			if (!message.ok) {
				return message
			}

			messages.push(message.value)
		}

		return { ok: true, value: Object.freeze(messages) }
	}

	#publish(snapshot: Snapshot) {
		this.log("publishing snapshot of %d messages to %d observers", snapshot.length, this.#observers.size)
		this.#value = snapshot
		for (const callback of [...this.#observers.values()]) {
			this.#notify(callback, snapshot)
		}
	}

	#notify(callback: SnapshotCallback, snapshot: Snapshot) {
		try {
			Promise.resolve(callback(snapshot)).catch((err) => this.log.error("observer failed: %O", err))
		} catch (err) {
			this.log.error("observer failed: %O", err)
		}
	}
}

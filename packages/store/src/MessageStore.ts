import { logger } from "@libp2p/logger"
import PQueue from "p-queue"

import type { StorageGateway } from "@msgstore/interfaces"
import { SqliteGateway } from "@msgstore/store-sqlite"

import { MessageStoreInit, StoreConfig, parseConfig } from "./config.js"
import { getSchema } from "./encoding.js"
import { createMessage, validateMessage } from "./message.js"
import { clearRequest, deleteRequest, insertRequest, updateRequest } from "./mutations.js"
import { SnapshotRepository } from "./SnapshotRepository.js"
import type { Message, MessageInit, SnapshotObservable } from "./types.js"
import { WriteSequencer } from "./WriteSequencer.js"

export type MessageStoreStats = {
	/** mutation requests waiting to be applied */
	pending: number
	applied: number
	writeFailures: number
	reloads: number
	reloadFailures: number
}

export class MessageStore {
	public static async open(init: MessageStoreInit): Promise<MessageStore> {
		const config = parseConfig(init)
		const gateway = init.gateway ?? new SqliteGateway({ path: config.path, init: getSchema(config.table) })
		return new MessageStore(config, gateway)
	}

	public readonly sequencer: WriteSequencer
	public readonly repository: SnapshotRepository

	private readonly log = logger("msgstore:store")

	// every write and every reload runs on this one queue
	private readonly executor = new PQueue({ concurrency: 1 })

	#closed = false

	private constructor(public readonly config: StoreConfig, private readonly gateway: StorageGateway) {
		const { table, currentUserId, conflictAlgorithm } = config
		this.sequencer = new WriteSequencer({ executor: this.executor, gateway, table, conflictAlgorithm })
		this.repository = new SnapshotRepository({ executor: this.executor, gateway, table, currentUserId })
		this.sequencer.addEventListener("change", () => this.repository.invalidate())
		this.log("opened message store on table %s", table)
	}

	public get stats(): MessageStoreStats {
		return {
			pending: this.sequencer.size,
			applied: this.sequencer.appliedCount,
			writeFailures: this.sequencer.failureCount,
			reloads: this.repository.reloadCount,
			reloadFailures: this.repository.failureCount,
		}
	}

	public getSnapshotObservable(): SnapshotObservable {
		return this.repository
	}

	/** Build a message whose direction is resolved against the current user. */
	public createMessage(init: MessageInit): Message {
		return createMessage(init, this.config.currentUserId)
	}

	public insert(message: Message | null | undefined): void {
		const result = validateMessage(message)
		if (!result.ok) {
			this.log.error("rejecting insert: %s", result.error.message)
			return
		}

		this.sequencer.enqueue(insertRequest(result.value))
	}

	public update(message: Message | null | undefined): void {
		const result = validateMessage(message)
		if (!result.ok) {
			this.log.error("rejecting update: %s", result.error.message)
			return
		}

		this.sequencer.enqueue(updateRequest(result.value))
	}

	/**
	 * Queue the deletion of a message. The request is applied later and its
	 * outcome is not reported, so this always returns `true`.
	 */
	public delete(message: Message | null | undefined): boolean {
		if (message === null || message === undefined) {
			this.log.error("rejecting delete: message is absent")
		} else {
			this.sequencer.enqueue(deleteRequest(message.id))
		}

		return true
	}

	public clear(): void {
		this.sequencer.enqueue(clearRequest())
	}

	/** Resolves once every queued write and reload has run. */
	public async onIdle() {
		await this.executor.onIdle()
	}

	public async close() {
		if (this.#closed) {
			return
		}

		this.log("closing")
		this.#closed = true
		this.sequencer.close()
		await this.executor.onIdle()

		this.repository.close()
		await this.executor.onIdle()
		await this.gateway.close()
	}
}

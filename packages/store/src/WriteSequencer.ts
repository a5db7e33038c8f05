import { TypedEventEmitter } from "@libp2p/interface"
import { logger } from "@libp2p/logger"
import type PQueue from "p-queue"

import type { ConflictAlgorithm, StorageGateway } from "@msgstore/interfaces"
import { Awaitable, Result, failure, signalInvalidType, toError } from "@msgstore/utils"

import { encodeClear, encodeDelete, encodeInsert, encodeUpdate } from "./encoding.js"
import { ClosedError } from "./errors.js"
import type { MutationRequest } from "./types.js"

export type WriteSequencerEvents = {
	/** a request was applied; `value` is the row id (insert) or the number of affected rows */
	change: CustomEvent<{ request: MutationRequest; value: number }>
	/** a request was dropped */
	failure: CustomEvent<{ request: MutationRequest; error: Error }>
}

export interface WriteSequencerInit {
	/** must run one task at a time */
	executor: PQueue
	gateway: StorageGateway
	table: string
	conflictAlgorithm?: ConflictAlgorithm
}

/**
 * The WriteSequencer applies mutation requests to the gateway one at a time,
 * in the order they were enqueued. Callers never learn the outcome; a failed
 * request is dropped and reported through the `failure` event.
 */
export class WriteSequencer extends TypedEventEmitter<WriteSequencerEvents> {
	private readonly log = logger("msgstore:sequencer")
	private readonly executor: PQueue
	private readonly gateway: StorageGateway
	private readonly table: string
	private readonly conflictAlgorithm?: ConflictAlgorithm

	#size = 0
	#appliedCount = 0
	#failureCount = 0
	#closed = false

	public constructor({ executor, gateway, table, conflictAlgorithm }: WriteSequencerInit) {
		super()
		this.executor = executor
		this.gateway = gateway
		this.table = table
		this.conflictAlgorithm = conflictAlgorithm
	}

	/** number of requests waiting to be applied */
	public get size() {
		return this.#size
	}

	public get appliedCount() {
		return this.#appliedCount
	}

	public get failureCount() {
		return this.#failureCount
	}

	public enqueue(request: MutationRequest): void {
		if (this.#closed) {
			const error = new ClosedError()
			this.#drop(request, error)
			queueMicrotask(() => this.#dispatchFailure(request, error))
			return
		}

		this.log.trace("enqueueing %o", request)
		this.#size++
		this.executor
			.add(async () => {
				try {
					// p-queue starts an idle task synchronously; never touch storage on the caller's stack
					await Promise.resolve()
					await this.#apply(request)
				} finally {
					this.#size--
				}
			})
			.catch((err) => this.log.error("internal error applying %s request: %O", request.type, err))
	}

	public async onIdle() {
		await this.executor.onIdle()
	}

	/** Stop accepting requests. Requests that are already queued are still applied. */
	public close() {
		this.log("closing with %d pending requests", this.#size)
		this.#closed = true
	}

	async #apply(request: MutationRequest) {
		let result: Result<number>
		try {
			result = await this.#dispatch(request)
		} catch (err) {
			result = failure(toError(err))
		}

		if (result.ok) {
			this.#appliedCount++
			this.log("applied %s request (%d)", request.type, result.value)
			this.dispatchEvent(new CustomEvent("change", { detail: { request, value: result.value } }))
		} else {
			this.#drop(request, result.error)
			this.#dispatchFailure(request, result.error)
		}
	}

	#dispatch(request: MutationRequest): Awaitable<Result<number>> {
		switch (request.type) {
			case "insert":
				return this.gateway.insert(encodeInsert(this.table, request.message, this.conflictAlgorithm))
			case "update":
				return this.gateway.update(encodeUpdate(this.table, request.message, this.conflictAlgorithm))
			case "delete":
				return this.gateway.delete(encodeDelete(this.table, request.id))
			case "clear":
				return this.gateway.delete(encodeClear(this.table))
			default:
				return signalInvalidType(request)
		}
	}

	#drop(request: MutationRequest, error: Error) {
		this.#failureCount++
		this.log.error("dropping %s request: %O", request.type, error)
	}

	#dispatchFailure(request: MutationRequest, error: Error) {
		this.dispatchEvent(new CustomEvent("failure", { detail: { request, error } }))
	}
}

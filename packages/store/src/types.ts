import type { Awaitable } from "@msgstore/utils"

/** derived at load time from the recipient and the current user */
export type Direction = "inbound" | "outbound"

export type TextContent = {
	readonly direction: Direction
	readonly text: string
}

export type Message = {
	readonly id: string
	readonly fromUserId: string
	readonly toUserId: string
	readonly content: TextContent
	/** milliseconds since the epoch; the ordering key */
	readonly createdAt: number
}

export type MessageInit = {
	id?: string
	fromUserId: string
	toUserId: string
	text: string
	createdAt?: number
}

export type MutationRequest =
	| { readonly type: "insert"; readonly message: Message }
	| { readonly type: "update"; readonly message: Message }
	| { readonly type: "delete"; readonly id: string }
	| { readonly type: "clear" }

/** ordered by createdAt, ascending; the array and every message in it are frozen */
export type Snapshot = readonly Message[]

export type SnapshotCallback = (snapshot: Snapshot) => Awaitable<void>

export type Subscription = {
	id: number
	unsubscribe: () => void
}

export interface SnapshotObservable {
	readonly value: Snapshot
	subscribe(callback: SnapshotCallback): Subscription
	unsubscribe(id: number): void
}

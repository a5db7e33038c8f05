import { freezeMessage } from "./message.js"
import type { Message, MutationRequest } from "./types.js"

export const insertRequest = (message: Message): MutationRequest =>
	Object.freeze({ type: "insert", message: freezeMessage(message) })

export const updateRequest = (message: Message): MutationRequest =>
	Object.freeze({ type: "update", message: freezeMessage(message) })

export const deleteRequest = (id: string): MutationRequest => Object.freeze({ type: "delete", id })

export const clearRequest = (): MutationRequest => Object.freeze({ type: "clear" })

import { nanoid } from "nanoid"

import { Result, failure, ok } from "@msgstore/utils"

import { ValidationError } from "./errors.js"
import type { Direction, Message, MessageInit } from "./types.js"

export function createMessage(
	{ id = nanoid(), fromUserId, toUserId, text, createdAt = Date.now() }: MessageInit,
	currentUserId: string,
): Message {
	const direction: Direction = toUserId === currentUserId ? "inbound" : "outbound"
	return { id, fromUserId, toUserId, content: { direction, text }, createdAt }
}

export const freezeMessage = (message: Message): Message =>
	Object.freeze({ ...message, content: Object.freeze({ ...message.content }) })

const isNonEmptyString = (value: unknown): value is string => typeof value === "string" && value.length > 0

/** Check a message handed in by a caller before it is queued for writing. */
export function validateMessage(message: Message | null | undefined): Result<Message, ValidationError> {
	if (message === null || message === undefined) {
		return failure(new ValidationError("message is absent"))
	} else if (!isNonEmptyString(message.id)) {
		return failure(new ValidationError("message id must be a non-empty string"))
	} else if (!isNonEmptyString(message.fromUserId) || !isNonEmptyString(message.toUserId)) {
		return failure(new ValidationError(`message ${message.id} has an invalid sender or recipient`))
	} else if (typeof message.content?.text !== "string") {
		return failure(new ValidationError(`message ${message.id} has no text content`))
	} else if (!Number.isSafeInteger(message.createdAt) || message.createdAt < 0) {
		return failure(new ValidationError(`message ${message.id} has an invalid timestamp`))
	}

	return ok(message)
}

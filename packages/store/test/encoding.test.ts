import test from "ava"

import {
	DecodeError,
	decodeRow,
	decodeTimestamp,
	encodeMessage,
	encodeTimestamp,
	getSchema,
	getSnapshotQuery,
} from "@msgstore/store"
import { AssertError } from "@msgstore/utils"

import { row } from "./utils.js"

test("timestamps are zero-padded so that text order is numeric order", (t) => {
	t.is(encodeTimestamp(0), "0000000000000000")
	t.is(encodeTimestamp(200), "0000000000000200")
	t.is(encodeTimestamp(Number.MAX_SAFE_INTEGER), "9007199254740991")
	t.true(encodeTimestamp(1000) > encodeTimestamp(200))

	t.throws(() => encodeTimestamp(-1), { instanceOf: AssertError })
	t.throws(() => encodeTimestamp(1.5), { instanceOf: AssertError })
})

test("decode timestamps", (t) => {
	t.is(decodeTimestamp("0000000000000200"), 200)
	t.is(decodeTimestamp("100"), 100)
	t.is(decodeTimestamp(""), null)
	t.is(decodeTimestamp("-100"), null)
	t.is(decodeTimestamp("12abc"), null)
	t.is(decodeTimestamp("99999999999999999999"), null)
})

test("encode a message as table columns", (t) => {
	t.deepEqual(
		encodeMessage({
			id: "m1",
			fromUserId: "u1",
			toUserId: "u2",
			content: { direction: "outbound", text: "hi" },
			createdAt: 100,
		}),
		{ id: "m1", content: "hi", from_user_id: "u1", to_user_id: "u2", created_at: "0000000000000100" },
	)
})

test("messages addressed to the current user are inbound", (t) => {
	t.deepEqual(decodeRow(row("m1", "hi", "u2", "u1", 100), "u1"), {
		ok: true,
		value: { id: "m1", fromUserId: "u2", toUserId: "u1", content: { direction: "inbound", text: "hi" }, createdAt: 100 },
	})

	t.deepEqual(decodeRow(row("m2", "yo", "u1", "u2", 200), "u1"), {
		ok: true,
		value: { id: "m2", fromUserId: "u1", toUserId: "u2", content: { direction: "outbound", text: "yo" }, createdAt: 200 },
	})
})

test("decoded messages are frozen", (t) => {
	const result = decodeRow(row("m1", "hi", "u2", "u1", 100), "u1")
	t.true(result.ok)
	if (result.ok) {
		t.true(Object.isFrozen(result.value))
		t.true(Object.isFrozen(result.value.content))
	}
})

test("decoding fails on the first invalid column", (t) => {
	const valid = row("m1", "hi", "u1", "u2", 100)

	for (const [column, value] of [
		["id", null],
		["content", 4],
		["from_user_id", null],
		["to_user_id", 7n],
		["created_at", "later"],
		["created_at", 100],
	] as const) {
		const result = decodeRow({ ...valid, [column]: value }, "u1")
		if (result.ok) {
			t.fail(`expected ${column} = ${String(value)} to fail`)
		} else {
			t.true(result.error instanceof DecodeError)
			t.is(result.error.column, column)
			t.is(result.error.message, `invalid value for column ${column}`)
		}
	}
})

test("snapshot query and schema", (t) => {
	t.deepEqual(getSnapshotQuery("messages"), { sql: `SELECT * FROM "messages" ORDER BY created_at` })

	const [createTable, createIndex] = getSchema("chat")
	t.true(createTable.startsWith(`CREATE TABLE IF NOT EXISTS "chat" (`))
	t.is(createIndex, `CREATE INDEX IF NOT EXISTS "chat_created_at" ON "chat" (created_at)`)

	t.throws(() => getSchema("bad name"), { instanceOf: AssertError })
})

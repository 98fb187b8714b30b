import assert from "node:assert/strict";
import test from "node:test";

import { deferred } from "../testing/fakes";
import { ConcurrentModificationError } from "./errors";
import { KeyedMutex } from "./keyedMutex";

test("tasks on one key run one at a time in arrival order", async () => {
	const mutex = new KeyedMutex(1_000);
	const order: string[] = [];
	const gate = deferred<void>();

	const first = mutex.runExclusive("BTCUSDT", async () => {
		order.push("first:start");
		await gate.promise;
		order.push("first:end");
	});
	const second = mutex.runExclusive("BTCUSDT", async () => {
		order.push("second");
	});
	const third = mutex.runExclusive("BTCUSDT", async () => {
		order.push("third");
	});

	assert.equal(mutex.isLocked("BTCUSDT"), true);
	gate.resolve();
	await Promise.all([first, second, third]);

	assert.deepEqual(order, ["first:start", "first:end", "second", "third"]);
	assert.equal(mutex.isLocked("BTCUSDT"), false);
});

test("different keys do not block each other", async () => {
	const mutex = new KeyedMutex(1_000);
	const gate = deferred<void>();
	const held = mutex.runExclusive("BTCUSDT", () => gate.promise);

	const other = await mutex.runExclusive("ETHUSDT", async () => "eth");
	assert.equal(other, "eth");

	gate.resolve();
	await held;
});

test("waiting past the limit throws ConcurrentModificationError", async () => {
	const mutex = new KeyedMutex(1_000);
	const gate = deferred<void>();
	const held = mutex.runExclusive("BTCUSDT", () => gate.promise);

	await assert.rejects(
		mutex.runExclusive("BTCUSDT", async () => "late", 20),
		(err: unknown) =>
			err instanceof ConcurrentModificationError && err.key === "BTCUSDT" && err.waitMs === 20,
	);

	gate.resolve();
	await held;
	assert.equal(mutex.isLocked("BTCUSDT"), false);
	assert.equal(await mutex.runExclusive("BTCUSDT", async () => "free"), "free");
});

test("a failing task releases the key", async () => {
	const mutex = new KeyedMutex(1_000);
	await assert.rejects(
		mutex.runExclusive("settings", async () => {
			throw new Error("boom");
		}),
		/boom/,
	);
	assert.equal(mutex.isLocked("settings"), false);
});

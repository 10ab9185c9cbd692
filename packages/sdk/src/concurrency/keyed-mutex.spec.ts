import { KeyedMutex } from "./keyed-mutex";

function gate(): { promise: Promise<void>; open: () => void } {
	let open: () => void = () => undefined;
	const promise = new Promise<void>((resolve) => {
		open = resolve;
	});
	return { promise, open };
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("KeyedMutex", () => {
	it("runs work for the same key one at a time", async () => {
		const mutex = new KeyedMutex();
		const events: string[] = [];
		const first = gate();

		const a = mutex.runExclusive("escrow:1", async () => {
			events.push("first:start");
			await first.promise;
			events.push("first:end");
		});
		const b = mutex.runExclusive("escrow:1", async () => {
			events.push("second:start");
		});

		await tick();
		expect(events).toEqual(["first:start"]);
		first.open();
		await Promise.all([a, b]);
		expect(events).toEqual(["first:start", "first:end", "second:start"]);
	});

	it("lets different keys proceed", async () => {
		const mutex = new KeyedMutex();
		const blocker = gate();
		const events: string[] = [];

		const a = mutex.runExclusive("escrow:1", () => blocker.promise);
		const b = mutex.runExclusive("escrow:2", async () => {
			events.push("escrow:2");
		});

		await b;
		expect(events).toEqual(["escrow:2"]);
		blocker.open();
		await a;
	});

	it("waits for every key of a multi-key request", async () => {
		const mutex = new KeyedMutex();
		const blocker = gate();
		const events: string[] = [];

		const held = mutex.runExclusive("b", () => blocker.promise);
		const both = mutex.runExclusive(["b", "a"], async () => {
			events.push("both");
		});

		await tick();
		expect(events).toEqual([]);
		blocker.open();
		await Promise.all([held, both]);
		expect(events).toEqual(["both"]);
	});

	it("releases the key when work throws", async () => {
		const mutex = new KeyedMutex();

		await expect(
			mutex.runExclusive("k", async () => {
				throw new Error("boom");
			}),
		).rejects.toThrow("boom");
		await expect(mutex.runExclusive("k", async () => 42)).resolves.toBe(42);
	});
});

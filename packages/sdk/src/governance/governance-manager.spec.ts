import { KeyedMutex } from "../concurrency/keyed-mutex";
import { MemoryUnitOfWork } from "../storage/memory-adapter";
import { GovernanceManager } from "./governance-manager";

describe("GovernanceManager", () => {
	let manager: GovernanceManager;

	beforeEach(() => {
		manager = new GovernanceManager({
			unitOfWork: new MemoryUnitOfWork(),
			locks: new KeyedMutex(),
		});
	});

	it("requires initialization", async () => {
		await expect(manager.current()).rejects.toMatchObject({
			code: "GovernanceNotInitialized",
		});
		await expect(manager.updateFeeRate("dao", 10)).rejects.toMatchObject({
			code: "GovernanceNotInitialized",
		});
		expect(await manager.isInitialized()).toBe(false);
	});

	it("initializes once with the caller as authority", async () => {
		const config = await manager.initialize("dao", {
			feeRateBps: 100,
			feeCollector: "treasury",
		});
		expect(config.authority).toBe("dao");
		expect(await manager.current()).toEqual(config);
		await expect(
			manager.initialize("someone-else", { feeRateBps: 0, feeCollector: "x" }),
		).rejects.toMatchObject({ code: "GovernanceAlreadyInitialized" });
	});

	it("keeps the version when an update is rejected", async () => {
		await manager.initialize("dao", { feeRateBps: 100, feeCollector: "treasury" });

		await expect(manager.updateFeeRate("dao", 1_001)).rejects.toMatchObject({
			code: "FeeRateOutOfBounds",
		});
		await expect(manager.updateFeeRate("mallory", 10)).rejects.toMatchObject({
			code: "Unauthorized",
		});
		expect(await manager.current()).toMatchObject({ feeRateBps: 100, version: 1 });
	});

	it("persists accepted updates", async () => {
		await manager.initialize("dao", { feeRateBps: 100, feeCollector: "treasury" });

		await manager.updateFeeRate("dao", 30);
		await manager.updateFeeCollector("dao", "ops");
		await manager.updateGovernance("dao", { feePolicy: "all-disbursements" });
		await manager.transferGovernance("dao", "council");

		expect(await manager.current()).toEqual({
			authority: "council",
			feeRateBps: 30,
			feeCollector: "ops",
			feePolicy: "all-disbursements",
			version: 5,
		});
		await expect(manager.updateFeeRate("dao", 10)).rejects.toMatchObject({
			code: "Unauthorized",
		});
	});

	it("serializes concurrent updates", async () => {
		await manager.initialize("dao", { feeRateBps: 100, feeCollector: "treasury" });

		await Promise.all([
			manager.updateFeeRate("dao", 1),
			manager.updateFeeRate("dao", 2),
			manager.updateFeeRate("dao", 3),
		]);

		expect(await manager.current()).toMatchObject({ feeRateBps: 3, version: 4 });
	});
});

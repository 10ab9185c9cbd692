import { MemoryCollateralVault } from "./memory-vault";

describe("MemoryCollateralVault", () => {
	let vault: MemoryCollateralVault;

	beforeEach(() => {
		vault = new MemoryCollateralVault();
		vault.credit("writer", "USDC", 1_000n);
	});

	it("moves locked funds into escrow custody", async () => {
		const receipt = await vault.lock({
			escrowId: "e1",
			owner: "writer",
			asset: "USDC",
			amount: 600n,
			idempotencyKey: "e1:lock",
		});

		expect(receipt).toMatchObject({
			kind: "lock",
			escrowId: "e1",
			party: "writer",
			amount: 600n,
		});
		expect(vault.balanceOf("writer", "USDC")).toBe(400n);
		expect(vault.heldFor("e1", "USDC")).toBe(600n);
	});

	it("refuses to lock more than the owner holds", async () => {
		await expect(
			vault.lock({
				escrowId: "e1",
				owner: "writer",
				asset: "USDC",
				amount: 1_001n,
				idempotencyKey: "e1:lock",
			}),
		).rejects.toMatchObject({ code: "VaultError", failure: "INSUFFICIENT_FUNDS" });
		expect(vault.balanceOf("writer", "USDC")).toBe(1_000n);
	});

	it("answers a repeated request with the original receipt", async () => {
		const request = {
			escrowId: "e1",
			owner: "writer",
			asset: "USDC",
			amount: 600n,
			idempotencyKey: "e1:lock",
		};
		const first = await vault.lock(request);
		const second = await vault.lock(request);

		expect(second.receiptId).toBe(first.receiptId);
		expect(vault.balanceOf("writer", "USDC")).toBe(400n);
		await expect(
			vault.lock({ ...request, amount: 700n }),
		).rejects.toMatchObject({ failure: "IDEMPOTENCY_CONFLICT" });
	});

	it("releases custody to the recipient", async () => {
		await vault.lock({
			escrowId: "e1",
			owner: "writer",
			asset: "USDC",
			amount: 600n,
			idempotencyKey: "e1:lock",
		});
		await vault.release({
			escrowId: "e1",
			recipient: "holder",
			asset: "USDC",
			amount: 250n,
			idempotencyKey: "e1:payout",
		});

		expect(vault.heldFor("e1", "USDC")).toBe(350n);
		expect(vault.balanceOf("holder", "USDC")).toBe(250n);
		await expect(
			vault.release({
				escrowId: "e1",
				recipient: "holder",
				asset: "USDC",
				amount: 351n,
				idempotencyKey: "e1:residual",
			}),
		).rejects.toMatchObject({ failure: "INSUFFICIENT_FUNDS" });
	});

	it("restores a snapshot", async () => {
		const snapshot = vault.snapshot();
		await vault.lock({
			escrowId: "e1",
			owner: "writer",
			asset: "USDC",
			amount: 600n,
			idempotencyKey: "e1:lock",
		});
		vault.restore(snapshot);

		expect(vault.balanceOf("writer", "USDC")).toBe(1_000n);
		expect(vault.heldFor("e1", "USDC")).toBe(0n);
	});
});

import type { DataSource } from "typeorm";
import { isOptionsEscrowError } from "@options-escrow/sdk";
import { createTestDataSource } from "../persistence/testing";
import { TypeOrmUnitOfWork } from "../persistence/typeorm-unit-of-work";
import { LedgerVault } from "./ledger-vault";

describe("LedgerVault", () => {
	let dataSource: DataSource;
	let unitOfWork: TypeOrmUnitOfWork;
	const vault = new LedgerVault();

	const balance = (holder: string) =>
		unitOfWork.transaction((m) =>
			vault.withTransaction(m).balanceOf(holder, "USDC"),
		);

	const held = (escrowId: string) =>
		unitOfWork.transaction((m) =>
			vault.withTransaction(m).heldFor(escrowId, "USDC"),
		);

	beforeEach(async () => {
		dataSource = await createTestDataSource();
		unitOfWork = new TypeOrmUnitOfWork(dataSource, vault);
		await unitOfWork.transaction((m) =>
			vault.withTransaction(m).credit("writer", "USDC", 1_000n),
		);
	});

	afterEach(async () => {
		await dataSource.destroy();
	});

	it("locks into custody and releases out of it", async () => {
		await unitOfWork.run(async ({ vault: session }) => {
			await session.lock({
				escrowId: "e1",
				owner: "writer",
				asset: "USDC",
				amount: 600n,
				idempotencyKey: "e1:lock",
			});
			await session.release({
				escrowId: "e1",
				recipient: "holder",
				asset: "USDC",
				amount: 250n,
				idempotencyKey: "e1:payout",
			});
		});

		expect(await balance("writer")).toBe(400n);
		expect(await held("e1")).toBe(350n);
		expect(await balance("holder")).toBe(250n);
	});

	it("answers a replayed request with the original receipt", async () => {
		const request = {
			escrowId: "e1",
			owner: "writer",
			asset: "USDC",
			amount: 600n,
			idempotencyKey: "e1:lock",
		};
		const first = await unitOfWork.run((scope) => scope.vault.lock(request));
		const second = await unitOfWork.run((scope) => scope.vault.lock(request));

		expect(second).toEqual(first);
		expect(await balance("writer")).toBe(400n);
	});

	it("rejects a reused key for a different transfer", async () => {
		await unitOfWork.run((scope) =>
			scope.vault.lock({
				escrowId: "e1",
				owner: "writer",
				asset: "USDC",
				amount: 600n,
				idempotencyKey: "e1:lock",
			}),
		);

		const attempt = unitOfWork.run((scope) =>
			scope.vault.lock({
				escrowId: "e1",
				owner: "writer",
				asset: "USDC",
				amount: 700n,
				idempotencyKey: "e1:lock",
			}),
		);

		await expect(attempt).rejects.toMatchObject({
			code: "VaultError",
			failure: "IDEMPOTENCY_CONFLICT",
		});
	});

	it("refuses to overdraw", async () => {
		const error = await unitOfWork
			.run((scope) =>
				scope.vault.lock({
					escrowId: "e1",
					owner: "writer",
					asset: "USDC",
					amount: 1_001n,
					idempotencyKey: "e1:lock",
				}),
			)
			.catch((e: unknown) => e);

		expect(isOptionsEscrowError(error, "VaultError")).toBe(true);
		expect(error).toMatchObject({
			failure: "INSUFFICIENT_FUNDS",
			details: { available: "1000", requested: "1001" },
		});
		expect(await balance("writer")).toBe(1_000n);
	});

	it("rolls transfers back with the transaction", async () => {
		await expect(
			unitOfWork.run(async (scope) => {
				await scope.vault.lock({
					escrowId: "e1",
					owner: "writer",
					asset: "USDC",
					amount: 600n,
					idempotencyKey: "e1:lock",
				});
				throw new Error("commit failed");
			}),
		).rejects.toThrow("commit failed");

		expect(await balance("writer")).toBe(1_000n);
		expect(await held("e1")).toBe(0n);
	});

	it("keeps escrow custody out of reach of holder accounts", async () => {
		await unitOfWork.run((scope) =>
			scope.vault.lock({
				escrowId: "e1",
				owner: "writer",
				asset: "USDC",
				amount: 600n,
				idempotencyKey: "e1:lock",
			}),
		);
		expect(await balance("escrow:e1")).toBe(0n);

		await unitOfWork.transaction((m) =>
			vault.withTransaction(m).credit("escrow:e1", "USDC", 100n),
		);
		await unitOfWork.run((scope) =>
			scope.vault.lock({
				escrowId: "e2",
				owner: "escrow:e1",
				asset: "USDC",
				amount: 100n,
				idempotencyKey: "e2:lock",
			}),
		);

		await expect(
			unitOfWork.run((scope) =>
				scope.vault.release({
					escrowId: "e2",
					recipient: "escrow:e1",
					asset: "USDC",
					amount: 700n,
					idempotencyKey: "e2:payout",
				}),
			),
		).rejects.toMatchObject({
			failure: "INSUFFICIENT_FUNDS",
			details: { available: "100", requested: "700" },
		});
		expect(await held("e1")).toBe(600n);
		expect(await held("e2")).toBe(100n);
		expect(await balance("escrow:e1")).toBe(0n);
	});
});

/**
 * In-Memory Collateral Vault
 *
 * Reference vault for tests and local tooling. Balances are kept per
 * (account, asset); escrow custody is kept per (escrow, asset).
 */

import { nanoid } from "nanoid";
import { VaultError } from "../core/errors.js";
import { checkedAdd, checkedSub } from "../core/checked-math.js";
import type { Amount, AssetId, Identity } from "../core/types.js";
import {
	type CollateralVault,
	type LockRequest,
	type ReleaseRequest,
	type VaultReceipt,
	type VaultTransferKind,
	matchesReceipt,
} from "./types.js";

export interface MemoryVaultSnapshot {
	balances: Map<string, Amount>;
	custody: Map<string, Amount>;
	receipts: Map<string, VaultReceipt>;
}

const key = (holder: string, asset: AssetId) => `${holder}\u0000${asset}`;

export class MemoryCollateralVault implements CollateralVault {
	private balances = new Map<string, Amount>();
	private custody = new Map<string, Amount>();
	private receipts = new Map<string, VaultReceipt>();

	credit(owner: Identity, asset: AssetId, amount: Amount): void {
		const k = key(owner, asset);
		this.balances.set(k, checkedAdd(this.balances.get(k) ?? 0n, amount));
	}

	balanceOf(owner: Identity, asset: AssetId): Amount {
		return this.balances.get(key(owner, asset)) ?? 0n;
	}

	heldFor(escrowId: string, asset: AssetId): Amount {
		return this.custody.get(key(escrowId, asset)) ?? 0n;
	}

	async lock(request: LockRequest): Promise<VaultReceipt> {
		const replay = this.replay("lock", request.escrowId, request.owner, request);
		if (replay) return replay;

		const from = key(request.owner, request.asset);
		const available = this.balances.get(from) ?? 0n;
		if (available < request.amount) {
			throw new VaultError(
				"INSUFFICIENT_FUNDS",
				`Insufficient ${request.asset} balance for ${request.owner}`,
				{ available: available.toString(), requested: request.amount.toString() },
			);
		}
		const to = key(request.escrowId, request.asset);
		this.balances.set(from, checkedSub(available, request.amount));
		this.custody.set(to, checkedAdd(this.custody.get(to) ?? 0n, request.amount));
		return this.record("lock", request.escrowId, request.owner, request);
	}

	async release(request: ReleaseRequest): Promise<VaultReceipt> {
		const replay = this.replay(
			"release",
			request.escrowId,
			request.recipient,
			request,
		);
		if (replay) return replay;

		const from = key(request.escrowId, request.asset);
		const held = this.custody.get(from) ?? 0n;
		if (held < request.amount) {
			throw new VaultError(
				"INSUFFICIENT_FUNDS",
				`Escrow ${request.escrowId} holds less ${request.asset} than requested`,
				{ held: held.toString(), requested: request.amount.toString() },
			);
		}
		this.custody.set(from, checkedSub(held, request.amount));
		this.credit(request.recipient, request.asset, request.amount);
		return this.record("release", request.escrowId, request.recipient, request);
	}

	snapshot(): MemoryVaultSnapshot {
		return {
			balances: new Map(this.balances),
			custody: new Map(this.custody),
			receipts: new Map(this.receipts),
		};
	}

	restore(snapshot: MemoryVaultSnapshot): void {
		this.balances = new Map(snapshot.balances);
		this.custody = new Map(snapshot.custody);
		this.receipts = new Map(snapshot.receipts);
	}

	private replay(
		kind: VaultTransferKind,
		escrowId: string,
		party: Identity,
		request: { asset: AssetId; amount: Amount; idempotencyKey: string },
	): VaultReceipt | undefined {
		const existing = this.receipts.get(request.idempotencyKey);
		if (!existing) return undefined;
		if (
			!matchesReceipt(existing, kind, escrowId, party, request.asset, request.amount)
		) {
			throw new VaultError(
				"IDEMPOTENCY_CONFLICT",
				`Idempotency key ${request.idempotencyKey} was used for a different transfer`,
			);
		}
		return existing;
	}

	private record(
		kind: VaultTransferKind,
		escrowId: string,
		party: Identity,
		request: { asset: AssetId; amount: Amount; idempotencyKey: string },
	): VaultReceipt {
		const receipt: VaultReceipt = {
			receiptId: nanoid(16),
			kind,
			escrowId,
			party,
			asset: request.asset,
			amount: request.amount,
			idempotencyKey: request.idempotencyKey,
		};
		this.receipts.set(request.idempotencyKey, receipt);
		return receipt;
	}
}

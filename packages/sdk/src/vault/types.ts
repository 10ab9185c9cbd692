/**
 * Collateral Vault Types
 *
 * The vault custodies collateral on behalf of escrows. The engine only
 * ever asks it to lock funds from an owner into an escrow or to release
 * funds from an escrow to a recipient. Implementations must be
 * idempotent per `idempotencyKey`.
 */

import type { Amount, AssetId, Identity } from "../core/types.js";

export interface LockRequest {
	escrowId: string;
	owner: Identity;
	asset: AssetId;
	amount: Amount;
	idempotencyKey: string;
}

export interface ReleaseRequest {
	escrowId: string;
	recipient: Identity;
	asset: AssetId;
	amount: Amount;
	idempotencyKey: string;
}

export type VaultTransferKind = "lock" | "release";

export interface VaultReceipt {
	receiptId: string;
	kind: VaultTransferKind;
	escrowId: string;
	/** Owner for a lock, recipient for a release. */
	party: Identity;
	asset: AssetId;
	amount: Amount;
	idempotencyKey: string;
}

export interface CollateralVault {
	/**
	 * Moves `amount` from the owner's free balance into escrow custody.
	 * @throws VaultError when funds are missing or the vault is unreachable
	 */
	lock(request: LockRequest): Promise<VaultReceipt>;

	/**
	 * Moves `amount` out of escrow custody to the recipient.
	 * @throws VaultError when custody holds less or the vault is unreachable
	 */
	release(request: ReleaseRequest): Promise<VaultReceipt>;
}

/**
 * A vault that can join a storage transaction, so that fund movements
 * commit or roll back together with escrow state.
 */
export interface TransactionalCollateralVault<TTransaction> {
	withTransaction(transaction: TTransaction): CollateralVault;
}

/**
 * Whether `receipt` answers the same request again.
 */
export function matchesReceipt(
	receipt: VaultReceipt,
	kind: VaultTransferKind,
	escrowId: string,
	party: Identity,
	asset: AssetId,
	amount: Amount,
): boolean {
	return (
		receipt.kind === kind &&
		receipt.escrowId === escrowId &&
		receipt.party === party &&
		receipt.asset === asset &&
		receipt.amount === amount
	);
}

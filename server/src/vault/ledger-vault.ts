import { Injectable } from "@nestjs/common";
import type { EntityManager } from "typeorm";
import { nanoid } from "nanoid";
import {
	type Amount,
	type AssetId,
	type CollateralVault,
	type Identity,
	type LockRequest,
	type ReleaseRequest,
	type TransactionalCollateralVault,
	type VaultReceipt,
	type VaultTransferKind,
	VaultError,
	checkedAdd,
	checkedSub,
	matchesReceipt,
} from "@options-escrow/sdk";
import { EscrowCustody } from "./escrow-custody.entity";
import { VaultAccount } from "./vault-account.entity";
import { VaultTransfer } from "./vault-transfer.entity";

type TransferRequest = {
	escrowId: string;
	asset: AssetId;
	amount: Amount;
	idempotencyKey: string;
};

/**
 * Vault session bound to one TypeORM transaction. Balances and transfers
 * it writes roll back with the surrounding escrow update.
 */
export class LedgerVaultSession implements CollateralVault {
	constructor(private readonly manager: EntityManager) {}

	async credit(holder: Identity, asset: AssetId, amount: Amount) {
		const account = await this.account(holder, asset);
		account.balance = checkedAdd(account.balance, amount);
		await this.manager.save(account);
		return account.balance;
	}

	async balanceOf(holder: Identity, asset: AssetId): Promise<Amount> {
		const account = await this.manager.findOne(VaultAccount, {
			where: { holder, asset },
		});
		return account?.balance ?? 0n;
	}

	/** Collateral currently held for `escrowId`. */
	async heldFor(escrowId: string, asset: AssetId): Promise<Amount> {
		const custody = await this.manager.findOne(EscrowCustody, {
			where: { escrowId, asset },
		});
		return custody?.balance ?? 0n;
	}

	async lock(request: LockRequest): Promise<VaultReceipt> {
		const replay = await this.replay("lock", request.owner, request);
		if (replay) return replay;

		const source = await this.account(request.owner, request.asset);
		debit(
			source,
			request.amount,
			`Insufficient ${request.asset} balance for ${request.owner}`,
		);
		await this.manager.save(source);
		const custody = await this.custody(request.escrowId, request.asset);
		custody.balance = checkedAdd(custody.balance, request.amount);
		await this.manager.save(custody);
		return this.record("lock", request.owner, request);
	}

	async release(request: ReleaseRequest): Promise<VaultReceipt> {
		const replay = await this.replay("release", request.recipient, request);
		if (replay) return replay;

		const custody = await this.custody(request.escrowId, request.asset);
		debit(
			custody,
			request.amount,
			`Escrow ${request.escrowId} holds less ${request.asset} than requested`,
		);
		await this.manager.save(custody);
		const target = await this.account(request.recipient, request.asset);
		target.balance = checkedAdd(target.balance, request.amount);
		await this.manager.save(target);
		return this.record("release", request.recipient, request);
	}

	private async account(holder: Identity, asset: AssetId) {
		const existing = await this.manager.findOne(VaultAccount, {
			where: { holder, asset },
		});
		return existing ?? this.manager.create(VaultAccount, {
			holder,
			asset,
			balance: 0n,
		});
	}

	private async custody(escrowId: string, asset: AssetId) {
		const existing = await this.manager.findOne(EscrowCustody, {
			where: { escrowId, asset },
		});
		return existing ?? this.manager.create(EscrowCustody, {
			escrowId,
			asset,
			balance: 0n,
		});
	}

	private async replay(
		kind: VaultTransferKind,
		party: Identity,
		request: TransferRequest,
	): Promise<VaultReceipt | undefined> {
		const row = await this.manager.findOne(VaultTransfer, {
			where: { idempotencyKey: request.idempotencyKey },
		});
		if (!row) return undefined;
		const existing = toReceipt(row);
		if (
			!matchesReceipt(
				existing,
				kind,
				request.escrowId,
				party,
				request.asset,
				request.amount,
			)
		) {
			throw new VaultError(
				"IDEMPOTENCY_CONFLICT",
				`Idempotency key ${request.idempotencyKey} was used for a different transfer`,
			);
		}
		return existing;
	}

	private async record(
		kind: VaultTransferKind,
		party: Identity,
		request: TransferRequest,
	): Promise<VaultReceipt> {
		const receipt: VaultReceipt = {
			receiptId: nanoid(16),
			kind,
			escrowId: request.escrowId,
			party,
			asset: request.asset,
			amount: request.amount,
			idempotencyKey: request.idempotencyKey,
		};
		await this.manager.insert(VaultTransfer, { ...receipt });
		return receipt;
	}
}

function debit(
	source: { balance: Amount },
	amount: Amount,
	shortfall: string,
) {
	if (source.balance < amount) {
		throw new VaultError("INSUFFICIENT_FUNDS", shortfall, {
			available: source.balance.toString(),
			requested: amount.toString(),
		});
	}
	source.balance = checkedSub(source.balance, amount);
}

function toReceipt(row: VaultTransfer): VaultReceipt {
	return {
		receiptId: row.receiptId,
		kind: row.kind,
		escrowId: row.escrowId,
		party: row.party,
		asset: row.asset,
		amount: row.amount,
		idempotencyKey: row.idempotencyKey,
	};
}

@Injectable()
export class LedgerVault
	implements TransactionalCollateralVault<EntityManager>
{
	withTransaction(manager: EntityManager): LedgerVaultSession {
		return new LedgerVaultSession(manager);
	}
}

/**
 * In-Memory Unit of Work
 *
 * Reference storage for tests and development. Transactions run one at a
 * time; a failed transaction restores the previous escrows, settlements,
 * governance and vault balances. Data is lost when the process exits.
 */

import { KeyedMutex } from "../concurrency/keyed-mutex.js";
import type { GovernanceConfig } from "../governance/types.js";
import type {
	EscrowRecord,
	SettlementRecord,
} from "../modules/options-escrow/types.js";
import { MemoryCollateralVault } from "../vault/memory-vault.js";
import {
	type EscrowStore,
	type GovernanceStore,
	StorageError,
	type TransactionScope,
	type UnitOfWork,
} from "./types.js";

class MemoryEscrowStore implements EscrowStore {
	constructor(
		private readonly escrows: Map<string, EscrowRecord>,
		private readonly settlements: Map<string, SettlementRecord>,
	) {}

	async load(id: string): Promise<EscrowRecord | null> {
		const record = this.escrows.get(id);
		return record ? { ...record } : null;
	}

	async insert(record: EscrowRecord): Promise<void> {
		if (this.escrows.has(record.id)) {
			throw new StorageError(`Escrow ${record.id} already exists`, "DUPLICATE_ID");
		}
		this.escrows.set(record.id, { ...record });
	}

	async compareAndSet(
		expectedVersion: number,
		record: EscrowRecord,
	): Promise<boolean> {
		const stored = this.escrows.get(record.id);
		if (!stored || stored.version !== expectedVersion) return false;
		this.escrows.set(record.id, { ...record });
		return true;
	}

	async saveSettlement(record: SettlementRecord): Promise<void> {
		this.settlements.set(record.escrowId, { ...record });
	}

	async loadSettlement(escrowId: string): Promise<SettlementRecord | null> {
		const record = this.settlements.get(escrowId);
		return record ? { ...record } : null;
	}
}

class MemoryGovernanceStore implements GovernanceStore {
	constructor(private readonly state: { governance: GovernanceConfig | null }) {}

	async load(): Promise<GovernanceConfig | null> {
		return this.state.governance ? { ...this.state.governance } : null;
	}

	async compareAndSet(
		expectedVersion: number | null,
		config: GovernanceConfig,
	): Promise<boolean> {
		if ((this.state.governance?.version ?? null) !== expectedVersion) {
			return false;
		}
		this.state.governance = { ...config };
		return true;
	}
}

/**
 * @example
 * ```typescript
 * const vault = new MemoryCollateralVault();
 * vault.credit("alice", "USDC", 1_000n);
 * const registry = new EscrowRegistry({ unitOfWork: new MemoryUnitOfWork(vault) });
 * ```
 */
export class MemoryUnitOfWork implements UnitOfWork {
	private escrows = new Map<string, EscrowRecord>();
	private settlements = new Map<string, SettlementRecord>();
	private readonly state: { governance: GovernanceConfig | null } = {
		governance: null,
	};
	private readonly commits = new KeyedMutex();

	constructor(readonly vault: MemoryCollateralVault = new MemoryCollateralVault()) {}

	run<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T> {
		return this.commits.runExclusive("commit", async () => {
			const escrows = new Map(this.escrows);
			const settlements = new Map(this.settlements);
			const governance = this.state.governance;
			const vault = this.vault.snapshot();
			try {
				return await work({
					escrows: new MemoryEscrowStore(this.escrows, this.settlements),
					governance: new MemoryGovernanceStore(this.state),
					vault: this.vault,
				});
			} catch (error) {
				this.escrows = escrows;
				this.settlements = settlements;
				this.state.governance = governance;
				this.vault.restore(vault);
				throw error;
			}
		});
	}
}

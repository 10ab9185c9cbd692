/**
 * Storage Types
 *
 * Persistence contracts for escrows, settlements and governance. Every
 * operation runs inside a {@link UnitOfWork}: reads and writes made
 * through one {@link TransactionScope} commit together or not at all.
 * Developers bring their own backend (SQLite, Postgres, in-memory, ...)
 * by implementing these interfaces.
 */

import type { GovernanceConfig } from "../governance/types.js";
import type {
	EscrowRecord,
	SettlementRecord,
} from "../modules/options-escrow/types.js";
import type { CollateralVault } from "../vault/types.js";

export interface EscrowStore {
	load(id: string): Promise<EscrowRecord | null>;

	/**
	 * @throws StorageError `DUPLICATE_ID` if the id is taken
	 */
	insert(record: EscrowRecord): Promise<void>;

	/**
	 * Replaces the stored record only if its version still equals
	 * `expectedVersion`. The stored version becomes `record.version`.
	 *
	 * @returns false when another writer got there first
	 */
	compareAndSet(expectedVersion: number, record: EscrowRecord): Promise<boolean>;

	saveSettlement(record: SettlementRecord): Promise<void>;

	loadSettlement(escrowId: string): Promise<SettlementRecord | null>;
}

export interface GovernanceStore {
	load(): Promise<GovernanceConfig | null>;

	/**
	 * Writes `config` if the stored version equals `expectedVersion`
	 * (`null`: nothing stored yet).
	 */
	compareAndSet(
		expectedVersion: number | null,
		config: GovernanceConfig,
	): Promise<boolean>;
}

export interface TransactionScope {
	escrows: EscrowStore;
	governance: GovernanceStore;
	vault: CollateralVault;
}

export interface UnitOfWork {
	/**
	 * Runs `work` in one transaction. If it throws, nothing it wrote
	 * (including vault movements) is kept.
	 */
	run<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T>;
}

/**
 * Error thrown by storage operations.
 */
export class StorageError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "StorageError";
	}
}

/**
 * Storage module - Pluggable persistence
 *
 * Defines the unit-of-work contracts and an in-memory reference
 * implementation. Developers bring their own persistence layer.
 */

export type {
	EscrowStore,
	GovernanceStore,
	TransactionScope,
	UnitOfWork,
} from "./types.js";

export { StorageError } from "./types.js";

export { MemoryUnitOfWork } from "./memory-adapter.js";

export {
	type LockRequest,
	type ReleaseRequest,
	type VaultTransferKind,
	type VaultReceipt,
	type CollateralVault,
	type TransactionalCollateralVault,
	matchesReceipt,
} from "./types.js";
export {
	type MemoryVaultSnapshot,
	MemoryCollateralVault,
} from "./memory-vault.js";

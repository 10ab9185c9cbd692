/**
 * Options Escrow SDK
 *
 * Framework-agnostic core of the options escrow engine: payoff math,
 * governance rules, the escrow lifecycle and pluggable storage and custody.
 *
 * @example
 * ```typescript
 * import {
 *   EscrowRegistry,
 *   GovernanceManager,
 *   KeyedMutex,
 *   MemoryCollateralVault,
 *   MemoryUnitOfWork,
 * } from "@options-escrow/sdk";
 *
 * const vault = new MemoryCollateralVault();
 * const unitOfWork = new MemoryUnitOfWork(vault);
 * const locks = new KeyedMutex();
 * const governance = new GovernanceManager({ unitOfWork, locks });
 * const registry = new EscrowRegistry({ unitOfWork, locks });
 *
 * await governance.initialize("dao", { feeRateBps: 100, feeCollector: "treasury" });
 * vault.credit("writer", "USDC", 1_000n);
 * const escrow = await registry.initializeEscrow("writer", {
 *   optionType: "call",
 *   style: "american",
 *   strikePrice: 100n,
 *   notional: 10n,
 *   expirationTime: now + 86_400,
 *   collateralAsset: "USDC",
 * }, now);
 * await registry.depositCollateral("writer", escrow.id, {
 *   amount: 1_000n,
 *   asset: "USDC",
 *   maxCollateral: 1_000n,
 * });
 * ```
 */

// Core - Identities, errors and checked arithmetic
export {
	type Identity,
	type Amount,
	type UnixTimestamp,
	type AssetId,
	ESCROW_ERROR_CODES,
	type EscrowErrorCode,
	OptionsEscrowError,
	VAULT_FAILURES,
	type VaultFailure,
	VaultError,
	isOptionsEscrowError,
	isRetryable,
	toVaultError,
	U64_MAX,
	U128_MAX,
	assertU64,
	assertTimestamp,
	checkedAdd,
	checkedSub,
	checkedMul,
	checkedMulDiv,
	absDiff,
	minBigInt,
	parseAmount,
} from "./core/index.js";

// Contracts - State machines and lifecycle
export {
	type StateDefinition,
	type StateTransition,
	type StateMachineConfig,
	ContractStateMachine,
	createState,
	createTransition,
} from "./contracts/index.js";

// Settlement - Payoff math
export * from "./settlement/index.js";

// Fees
export * from "./fees/index.js";

// Governance
export * from "./governance/index.js";

// Vault - Custody contract and reference vault
export * from "./vault/index.js";

// Storage - Unit of work and reference implementation
export * from "./storage/index.js";

// Concurrency
export * from "./concurrency/index.js";

// Modules - Pre-built contract types
export * from "./modules/options-escrow/index.js";

export type { Identity, Amount, UnixTimestamp, AssetId } from "./types.js";
export {
	ESCROW_ERROR_CODES,
	type EscrowErrorCode,
	OptionsEscrowError,
	VAULT_FAILURES,
	type VaultFailure,
	VaultError,
	isOptionsEscrowError,
	isRetryable,
	toVaultError,
} from "./errors.js";
export {
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
} from "./checked-math.js";

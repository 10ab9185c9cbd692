/**
 * Error taxonomy for options escrow operations.
 *
 * Every rejected operation throws an {@link OptionsEscrowError} whose `code`
 * lets callers tell business-rule violations apart from transient
 * collaborator failures.
 */

export const ESCROW_ERROR_CODES = [
	"InvalidParameters",
	"Unauthorized",
	"InvalidState",
	"AlreadySettled",
	"NotExpired",
	"Expired",
	"NotITM",
	"NotAmerican",
	"InsufficientCollateral",
	"IncorrectCollateralAsset",
	"FeeRateOutOfBounds",
	"ArithmeticOverflow",
	"StaleGovernanceConfig",
	"VaultError",
	"EscrowNotFound",
	"GovernanceNotInitialized",
	"GovernanceAlreadyInitialized",
] as const;
export type EscrowErrorCode = (typeof ESCROW_ERROR_CODES)[number];

export class OptionsEscrowError extends Error {
	constructor(
		public readonly code: EscrowErrorCode,
		message: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "OptionsEscrowError";
	}
}

export const VAULT_FAILURES = [
	"INSUFFICIENT_FUNDS",
	"IDEMPOTENCY_CONFLICT",
	"UNAVAILABLE",
] as const;
export type VaultFailure = (typeof VAULT_FAILURES)[number];

/**
 * Failure reported by the collateral vault.
 *
 * `UNAVAILABLE` is the only transient reason; the other two mean the
 * request itself can never succeed as issued.
 */
export class VaultError extends OptionsEscrowError {
	constructor(
		public readonly failure: VaultFailure,
		message: string,
		details?: unknown,
	) {
		super("VaultError", message, details);
		this.name = "VaultError";
	}
}

export function isOptionsEscrowError(
	error: unknown,
	code?: EscrowErrorCode,
): error is OptionsEscrowError {
	return (
		error instanceof OptionsEscrowError &&
		(code === undefined || error.code === code)
	);
}

/**
 * Whether the same request may succeed if issued again later.
 */
export function isRetryable(error: unknown): boolean {
	if (error instanceof VaultError) {
		return error.failure === "UNAVAILABLE";
	}
	return isOptionsEscrowError(error, "StaleGovernanceConfig");
}

/**
 * Wraps anything thrown by an external collaborator as a transient vault failure.
 */
export function toVaultError(error: unknown): OptionsEscrowError {
	if (error instanceof OptionsEscrowError) return error;
	const message = error instanceof Error ? error.message : String(error);
	return new VaultError("UNAVAILABLE", `Vault unavailable: ${message}`, {
		cause: error,
	});
}

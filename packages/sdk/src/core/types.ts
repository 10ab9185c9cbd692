/**
 * Core types shared by every options escrow module.
 */

/**
 * Opaque caller identity.
 *
 * The engine never authenticates; whoever calls into it has already
 * verified the caller and passes the resulting identity explicitly.
 */
export type Identity = string;

/** Unsigned 64-bit fixed-point amount, always a non-negative bigint. */
export type Amount = bigint;

/** Unix timestamp in seconds. */
export type UnixTimestamp = number;

/** Identifier of the asset held as collateral (a mint, a ticker, a ledger code). */
export type AssetId = string;

/**
 * Options Escrow Module Types
 *
 * An initializer (the writer) locks collateral against a strike and an
 * expiration. The holder (counterparty) collects the ITM payoff, either at
 * expiry or, for American options, earlier by exercising.
 */

import type {
	Amount,
	AssetId,
	Identity,
	UnixTimestamp,
} from "../../core/types.js";
import type { FeePolicy } from "../../governance/types.js";
import type {
	ExerciseStyle,
	Moneyness,
	OptionType,
} from "../../settlement/types.js";

/**
 * Escrow lifecycle states.
 *
 * - created: Terms recorded, no collateral yet
 * - collateralized: Collateral locked in the vault
 * - exercised: Early exercise accepted, disbursement in progress
 * - settled: Funds disbursed, terminal
 * - cancelled: Withdrawn before collateralization, terminal
 */
export const ESCROW_STATUSES = [
	"created",
	"collateralized",
	"exercised",
	"settled",
	"cancelled",
] as const;
export type EscrowStatus = (typeof ESCROW_STATUSES)[number];

export type EscrowAction = "deposit" | "exercise" | "settle" | "cancel";

export interface EscrowRecord {
	id: string;
	initializer: Identity;
	counterparty: Identity | null;
	optionType: OptionType;
	style: ExerciseStyle;
	strikePrice: Amount;
	notional: Amount;
	expirationTime: UnixTimestamp;
	collateralAsset: AssetId;
	collateralAmount: Amount;
	status: EscrowStatus;
	createdAt: UnixTimestamp;
	/** Bumped on every committed write, for compare-and-set. */
	version: number;
	lockReceipt: string | null;
	settledAt: UnixTimestamp | null;
	cancelledAt: UnixTimestamp | null;
}

export interface InitializeEscrowParams {
	optionType: OptionType;
	style: ExerciseStyle;
	strikePrice: Amount;
	notional: Amount;
	expirationTime: UnixTimestamp;
	collateralAsset: AssetId;
	counterparty?: Identity | null;
}

export interface DepositCollateralParams {
	amount: Amount;
	asset: AssetId;
	/** Collateral cap for calls; ignored for puts. */
	maxCollateral?: Amount;
}

export type SettlementKind = "exercise" | "expiry";

export type DisbursementKind = "payout" | "residual" | "fee";

export interface Disbursement {
	kind: DisbursementKind;
	recipient: Identity;
	amount: Amount;
}

export interface SettlementRecord {
	escrowId: string;
	kind: SettlementKind;
	spotPrice: Amount;
	moneyness: Moneyness;
	rawPayoff: bigint;
	payoff: Amount;
	holder: Identity;
	holderAmount: Amount;
	initializerAmount: Amount;
	fee: Amount;
	feeCollector: Identity;
	feeRateBps: number;
	feePolicy: FeePolicy;
	governanceVersion: number;
	settledAt: UnixTimestamp;
}

export interface SettlementOutcome {
	escrow: EscrowRecord;
	settlement: SettlementRecord;
	disbursements: Disbursement[];
}

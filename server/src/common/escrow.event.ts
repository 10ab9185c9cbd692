import type { Moneyness, SettlementKind } from "@options-escrow/sdk";

export type EscrowId = string;

export const ESCROW_INITIALIZED_ID = "escrow.initialized";
export type EscrowInitialized = {
	eventId: string;
	escrowId: EscrowId;
	initializer: string;
	counterparty: string | null;
	createdAt: number; // unix seconds
};

export const ESCROW_COLLATERALIZED_ID = "escrow.collateralized";
export type EscrowCollateralized = {
	eventId: string;
	escrowId: EscrowId;
	asset: string;
	amount: string;
	lockReceipt: string | null;
};

export const ESCROW_SETTLED_ID = "escrow.settled";
export type EscrowSettled = {
	eventId: string;
	escrowId: EscrowId;
	kind: SettlementKind;
	moneyness: Moneyness;
	holder: string;
	payoff: string;
	fee: string;
	settledAt: number;
};

export const ESCROW_CANCELLED_ID = "escrow.cancelled";
export type EscrowCancelled = {
	eventId: string;
	escrowId: EscrowId;
	cancelledAt: number;
};

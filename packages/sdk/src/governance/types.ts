import type { Identity } from "../core/types.js";

/**
 * Which settlement disbursements are charged the governance fee.
 *
 * - itm-payoff: only the holder's ITM payout
 * - all-disbursements: the payout and whatever returns to the initializer
 */
export const FEE_POLICIES = ["itm-payoff", "all-disbursements"] as const;
export type FeePolicy = (typeof FEE_POLICIES)[number];

export const DEFAULT_FEE_POLICY: FeePolicy = "itm-payoff";

export interface GovernanceConfig {
	authority: Identity;
	feeRateBps: number;
	feeCollector: Identity;
	feePolicy: FeePolicy;
	/** Incremented on every committed mutation. */
	version: number;
}

export interface GovernanceInit {
	feeRateBps: number;
	feeCollector: Identity;
	feePolicy?: FeePolicy;
}

export interface GovernanceUpdate {
	feeRateBps?: number;
	feeCollector?: Identity;
	feePolicy?: FeePolicy;
}

import type { Amount } from "../core/types.js";

export const OPTION_TYPES = ["call", "put"] as const;
export type OptionType = (typeof OPTION_TYPES)[number];

export const EXERCISE_STYLES = ["american", "european"] as const;
export type ExerciseStyle = (typeof EXERCISE_STYLES)[number];

export type Moneyness = "itm" | "otm";

export interface PayoffInput {
	optionType: OptionType;
	strikePrice: Amount;
	notional: Amount;
	spotPrice: Amount;
	collateralAmount: Amount;
}

export interface PayoffResult {
	moneyness: Moneyness;
	/** Unclamped intrinsic value; may exceed the u64 domain. */
	rawPayoff: bigint;
	/** Amount owed to the holder, never more than the collateral. */
	payoff: Amount;
	/** Collateral left for the initializer. */
	residual: Amount;
	clamped: boolean;
}

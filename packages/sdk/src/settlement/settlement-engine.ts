/**
 * Settlement Engine
 *
 * Pure payoff math for cash-settled options. Holds no state and never
 * touches funds; the registry applies its results.
 */

import { OptionsEscrowError } from "../core/errors.js";
import {
	U128_MAX,
	absDiff,
	checkedMul,
	checkedSub,
	minBigInt,
} from "../core/checked-math.js";
import type { Amount } from "../core/types.js";
import type {
	Moneyness,
	OptionType,
	PayoffInput,
	PayoffResult,
} from "./types.js";

/**
 * A call is in the money strictly above the strike, a put strictly below.
 * Spot equal to strike is out of the money for both.
 */
export function isInTheMoney(
	optionType: OptionType,
	strikePrice: Amount,
	spotPrice: Amount,
): boolean {
	return optionType === "call"
		? spotPrice > strikePrice
		: spotPrice < strikePrice;
}

export function classifyMoneyness(
	optionType: OptionType,
	strikePrice: Amount,
	spotPrice: Amount,
): Moneyness {
	return isInTheMoney(optionType, strikePrice, spotPrice) ? "itm" : "otm";
}

/**
 * Computes the holder's payoff, clamped to the locked collateral.
 *
 * payoff = min(|spot - strike| * notional, collateral) when ITM, else 0.
 */
export function computePayoff(input: PayoffInput): PayoffResult {
	const moneyness = classifyMoneyness(
		input.optionType,
		input.strikePrice,
		input.spotPrice,
	);
	if (moneyness === "otm") {
		return {
			moneyness,
			rawPayoff: 0n,
			payoff: 0n,
			residual: input.collateralAmount,
			clamped: false,
		};
	}

	const rawPayoff = checkedMul(
		absDiff(input.spotPrice, input.strikePrice),
		input.notional,
		U128_MAX,
	);
	const payoff = minBigInt(rawPayoff, input.collateralAmount);
	return {
		moneyness,
		rawPayoff,
		payoff,
		residual: checkedSub(input.collateralAmount, payoff),
		clamped: rawPayoff > input.collateralAmount,
	};
}

/**
 * Minimum collateral the initializer must lock.
 *
 * A put can lose at most strike * notional. A call's loss is unbounded, so
 * the depositor has to name the cap explicitly through `maxCollateral`;
 * payouts beyond it are clamped. `maxCollateral` is only consulted for calls.
 */
export function requiredCollateral(
	optionType: OptionType,
	strikePrice: Amount,
	notional: Amount,
	maxCollateral?: Amount,
): Amount {
	if (optionType === "put") {
		return checkedMul(strikePrice, notional);
	}
	if (maxCollateral === undefined || maxCollateral <= 0n) {
		throw new OptionsEscrowError(
			"InvalidParameters",
			"Call options require an explicit maxCollateral",
		);
	}
	return maxCollateral;
}

import { OptionsEscrowError } from "../core/errors.js";
import { checkedMulDiv } from "../core/checked-math.js";
import type { Amount } from "../core/types.js";

export const BPS_DENOMINATOR = 10_000n;

/** Upper bound for the governance fee rate: 10%. */
export const MAX_FEE_BPS = 1_000;

/**
 * Rejects anything but an integer rate in [0, MAX_FEE_BPS].
 */
export function assertFeeRate(feeRateBps: number): number {
	if (
		!Number.isInteger(feeRateBps) ||
		feeRateBps < 0 ||
		feeRateBps > MAX_FEE_BPS
	) {
		throw new OptionsEscrowError(
			"FeeRateOutOfBounds",
			`Fee rate must be an integer between 0 and ${MAX_FEE_BPS} bps`,
			{ feeRateBps, max: MAX_FEE_BPS },
		);
	}
	return feeRateBps;
}

/**
 * fee = floor(amount * feeRateBps / 10000)
 */
export function calculateFee(amount: Amount, feeRateBps: number): Amount {
	assertFeeRate(feeRateBps);
	return checkedMulDiv(amount, BigInt(feeRateBps), BPS_DENOMINATOR);
}

export {
	BPS_DENOMINATOR,
	MAX_FEE_BPS,
	assertFeeRate,
	calculateFee,
} from "./fee-calculator.js";

export {
	OPTION_TYPES,
	type OptionType,
	EXERCISE_STYLES,
	type ExerciseStyle,
	type Moneyness,
	type PayoffInput,
	type PayoffResult,
} from "./types.js";
export {
	isInTheMoney,
	classifyMoneyness,
	computePayoff,
	requiredCollateral,
} from "./settlement-engine.js";

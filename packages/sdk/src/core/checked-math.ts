/**
 * Checked unsigned arithmetic on bigint.
 *
 * Amounts live in the u64 domain. Products that feed a division or a clamp
 * may use the u128 domain, whose results are then narrowed back.
 */

import { OptionsEscrowError } from "./errors.js";

export const U64_MAX = (1n << 64n) - 1n;
export const U128_MAX = (1n << 128n) - 1n;

function overflow(operation: string, a: bigint, b: bigint): OptionsEscrowError {
	return new OptionsEscrowError(
		"ArithmeticOverflow",
		`Arithmetic overflow in ${operation}`,
		{ a: a.toString(), b: b.toString() },
	);
}

function bounded(
	operation: string,
	a: bigint,
	b: bigint,
	result: bigint,
	max: bigint,
): bigint {
	if (result < 0n || result > max) {
		throw overflow(operation, a, b);
	}
	return result;
}

/**
 * Validates that an externally supplied value is a u64.
 */
export function assertU64(value: bigint, label: string): bigint {
	if (value < 0n || value > U64_MAX) {
		throw new OptionsEscrowError(
			"InvalidParameters",
			`${label} must be an unsigned 64-bit integer`,
			{ [label]: value.toString() },
		);
	}
	return value;
}

export function checkedAdd(a: bigint, b: bigint, max = U64_MAX): bigint {
	return bounded("add", a, b, a + b, max);
}

export function checkedSub(a: bigint, b: bigint): bigint {
	return bounded("sub", a, b, a - b, U64_MAX);
}

export function checkedMul(a: bigint, b: bigint, max = U64_MAX): bigint {
	return bounded("mul", a, b, a * b, max);
}

/**
 * floor(a * b / divisor) with a u128 intermediate and a u64 result.
 */
export function checkedMulDiv(a: bigint, b: bigint, divisor: bigint): bigint {
	if (divisor <= 0n) {
		throw new OptionsEscrowError("ArithmeticOverflow", "Division by zero");
	}
	const product = checkedMul(a, b, U128_MAX);
	return bounded("div", product, divisor, product / divisor, U64_MAX);
}

export function absDiff(a: bigint, b: bigint): bigint {
	return a > b ? a - b : b - a;
}

export function minBigInt(a: bigint, b: bigint): bigint {
	return a < b ? a : b;
}

/**
 * Parses a decimal string into a u64.
 */
export function parseAmount(value: string, label: string): bigint {
	if (!/^[0-9]+$/.test(value)) {
		throw new OptionsEscrowError(
			"InvalidParameters",
			`${label} must be a non-negative decimal integer`,
			{ [label]: value },
		);
	}
	return assertU64(BigInt(value), label);
}

/**
 * Validates a unix timestamp in seconds.
 */
export function assertTimestamp(value: number, label: string): number {
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new OptionsEscrowError(
			"InvalidParameters",
			`${label} must be a non-negative integer timestamp`,
			{ [label]: value },
		);
	}
	return value;
}

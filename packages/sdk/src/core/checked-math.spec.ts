import {
	U64_MAX,
	assertTimestamp,
	checkedAdd,
	checkedMul,
	checkedMulDiv,
	checkedSub,
	parseAmount,
} from "./checked-math";
import { isOptionsEscrowError } from "./errors";

function thrownCode(fn: () => unknown): string | undefined {
	try {
		fn();
	} catch (error) {
		return isOptionsEscrowError(error) ? error.code : "unexpected";
	}
	return undefined;
}

describe("checked math", () => {
	it("adds within the u64 domain", () => {
		expect(checkedAdd(U64_MAX - 1n, 1n)).toBe(U64_MAX);
		expect(thrownCode(() => checkedAdd(U64_MAX, 1n))).toBe(
			"ArithmeticOverflow",
		);
	});

	it("rejects subtraction below zero", () => {
		expect(checkedSub(5n, 5n)).toBe(0n);
		expect(thrownCode(() => checkedSub(1n, 2n))).toBe("ArithmeticOverflow");
	});

	it("rejects products above u64", () => {
		expect(checkedMul(1n << 32n, (1n << 32n) - 1n)).toBe(
			(1n << 64n) - (1n << 32n),
		);
		expect(thrownCode(() => checkedMul(1n << 32n, 1n << 32n))).toBe(
			"ArithmeticOverflow",
		);
	});

	it("divides through a u128 intermediate", () => {
		expect(checkedMulDiv(U64_MAX, 1_000n, 10_000n)).toBe(
			1_844_674_407_370_955_161n,
		);
		expect(thrownCode(() => checkedMulDiv(U64_MAX, 2n, 1n))).toBe(
			"ArithmeticOverflow",
		);
		expect(thrownCode(() => checkedMulDiv(1n, 1n, 0n))).toBe(
			"ArithmeticOverflow",
		);
	});

	it("parses decimal amounts", () => {
		expect(parseAmount("0042", "amount")).toBe(42n);
		expect(parseAmount("18446744073709551615", "amount")).toBe(U64_MAX);
		expect(thrownCode(() => parseAmount("18446744073709551616", "amount"))).toBe(
			"InvalidParameters",
		);
		expect(thrownCode(() => parseAmount("-1", "amount"))).toBe(
			"InvalidParameters",
		);
		expect(thrownCode(() => parseAmount("1e3", "amount"))).toBe(
			"InvalidParameters",
		);
	});

	it("accepts only non-negative integer timestamps", () => {
		expect(assertTimestamp(0, "now")).toBe(0);
		expect(thrownCode(() => assertTimestamp(1.5, "now"))).toBe(
			"InvalidParameters",
		);
		expect(thrownCode(() => assertTimestamp(-1, "now"))).toBe(
			"InvalidParameters",
		);
	});
});

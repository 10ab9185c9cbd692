import {
	OptionsEscrowError,
	VaultError,
	isRetryable,
	toVaultError,
} from "./errors";

describe("isRetryable", () => {
	it("treats an unavailable vault and stale governance as transient", () => {
		expect(isRetryable(new VaultError("UNAVAILABLE", "down"))).toBe(true);
		expect(
			isRetryable(new OptionsEscrowError("StaleGovernanceConfig", "stale")),
		).toBe(true);
	});

	it("treats business rule violations as final", () => {
		expect(isRetryable(new VaultError("INSUFFICIENT_FUNDS", "empty"))).toBe(
			false,
		);
		expect(isRetryable(new OptionsEscrowError("NotExpired", "early"))).toBe(
			false,
		);
		expect(isRetryable(new Error("boom"))).toBe(false);
	});
});

describe("toVaultError", () => {
	it("wraps foreign failures as an unavailable vault", () => {
		const wrapped = toVaultError(new Error("connection reset"));
		expect(wrapped).toBeInstanceOf(VaultError);
		expect(wrapped).toMatchObject({
			code: "VaultError",
			failure: "UNAVAILABLE",
			message: "Vault unavailable: connection reset",
		});
	});

	it("passes domain errors through", () => {
		const original = new VaultError("INSUFFICIENT_FUNDS", "empty");
		expect(toVaultError(original)).toBe(original);
	});
});

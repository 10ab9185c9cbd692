/**
 * Governance rules
 *
 * Pure transformations of a {@link GovernanceConfig}. Every function either
 * returns a new config with `version + 1` or throws, leaving the input as is.
 */

import { OptionsEscrowError } from "../core/errors.js";
import type { Identity } from "../core/types.js";
import { assertFeeRate } from "../fees/fee-calculator.js";
import {
	DEFAULT_FEE_POLICY,
	FEE_POLICIES,
	type FeePolicy,
	type GovernanceConfig,
	type GovernanceInit,
	type GovernanceUpdate,
} from "./types.js";

function assertIdentity(value: Identity, label: string): Identity {
	if (value.trim().length === 0) {
		throw new OptionsEscrowError(
			"InvalidParameters",
			`${label} must not be empty`,
		);
	}
	return value;
}

function assertFeePolicy(value: string): FeePolicy {
	const policy = FEE_POLICIES.find((p) => p === value);
	if (!policy) {
		throw new OptionsEscrowError(
			"InvalidParameters",
			`Unknown fee policy "${value}"`,
			{ allowed: FEE_POLICIES },
		);
	}
	return policy;
}

export function createGovernanceConfig(
	authority: Identity,
	init: GovernanceInit,
): GovernanceConfig {
	return {
		authority: assertIdentity(authority, "authority"),
		feeRateBps: assertFeeRate(init.feeRateBps),
		feeCollector: assertIdentity(init.feeCollector, "feeCollector"),
		feePolicy: assertFeePolicy(init.feePolicy ?? DEFAULT_FEE_POLICY),
		version: 1,
	};
}

export function assertAuthority(
	config: GovernanceConfig,
	caller: Identity,
): void {
	if (config.authority !== caller) {
		throw new OptionsEscrowError(
			"Unauthorized",
			"Only the governance authority can modify governance",
			{ caller },
		);
	}
}

/**
 * Applies a partial update atomically: all fields validate or none apply.
 */
export function applyGovernanceUpdate(
	config: GovernanceConfig,
	caller: Identity,
	update: GovernanceUpdate,
): GovernanceConfig {
	assertAuthority(config, caller);
	if (
		update.feeRateBps === undefined &&
		update.feeCollector === undefined &&
		update.feePolicy === undefined
	) {
		throw new OptionsEscrowError(
			"InvalidParameters",
			"Governance update must change at least one field",
		);
	}
	return {
		...config,
		feeRateBps:
			update.feeRateBps === undefined
				? config.feeRateBps
				: assertFeeRate(update.feeRateBps),
		feeCollector:
			update.feeCollector === undefined
				? config.feeCollector
				: assertIdentity(update.feeCollector, "feeCollector"),
		feePolicy:
			update.feePolicy === undefined
				? config.feePolicy
				: assertFeePolicy(update.feePolicy),
		version: config.version + 1,
	};
}

export function updateFeeRate(
	config: GovernanceConfig,
	caller: Identity,
	feeRateBps: number,
): GovernanceConfig {
	return applyGovernanceUpdate(config, caller, { feeRateBps });
}

export function updateFeeCollector(
	config: GovernanceConfig,
	caller: Identity,
	feeCollector: Identity,
): GovernanceConfig {
	return applyGovernanceUpdate(config, caller, { feeCollector });
}

/**
 * Hands authority to `newAuthority` in a single step.
 *
 * There is no acceptance handshake: a mistyped identity locks governance
 * for good.
 */
export function transferGovernance(
	config: GovernanceConfig,
	caller: Identity,
	newAuthority: Identity,
): GovernanceConfig {
	assertAuthority(config, caller);
	return {
		...config,
		authority: assertIdentity(newAuthority, "newAuthority"),
		version: config.version + 1,
	};
}

/**
 * Fails when governance moved on since `snapshot` was read.
 */
export function assertGovernanceFresh(
	snapshot: GovernanceConfig,
	current: GovernanceConfig | null,
): GovernanceConfig {
	if (!current || current.version !== snapshot.version) {
		throw new OptionsEscrowError(
			"StaleGovernanceConfig",
			"Governance configuration changed during the operation",
			{ expected: snapshot.version, actual: current?.version ?? null },
		);
	}
	return current;
}

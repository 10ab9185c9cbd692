/**
 * Governance Manager
 *
 * Serializes governance mutations and persists them with a compare-and-set
 * on `version`, so a settlement that read an older version can detect it.
 */

import {
	GOVERNANCE_LOCK_KEY,
	KeyedMutex,
} from "../concurrency/keyed-mutex.js";
import { OptionsEscrowError } from "../core/errors.js";
import type { Identity } from "../core/types.js";
import type { UnitOfWork } from "../storage/types.js";
import {
	applyGovernanceUpdate,
	createGovernanceConfig,
	transferGovernance,
	updateFeeCollector,
	updateFeeRate,
} from "./governance-rules.js";
import type {
	GovernanceConfig,
	GovernanceInit,
	GovernanceUpdate,
} from "./types.js";

export interface GovernanceManagerOptions {
	unitOfWork: UnitOfWork;
	locks?: KeyedMutex;
}

function notInitialized(): OptionsEscrowError {
	return new OptionsEscrowError(
		"GovernanceNotInitialized",
		"Governance has not been initialized",
	);
}

export class GovernanceManager {
	private readonly unitOfWork: UnitOfWork;
	private readonly locks: KeyedMutex;

	constructor(options: GovernanceManagerOptions) {
		this.unitOfWork = options.unitOfWork;
		this.locks = options.locks ?? new KeyedMutex();
	}

	/**
	 * Creates the singleton config with `caller` as authority.
	 */
	initialize(caller: Identity, init: GovernanceInit): Promise<GovernanceConfig> {
		return this.locks.runExclusive(GOVERNANCE_LOCK_KEY, () =>
			this.unitOfWork.run(async (scope) => {
				const config = createGovernanceConfig(caller, init);
				const existing = await scope.governance.load();
				if (existing || !(await scope.governance.compareAndSet(null, config))) {
					throw new OptionsEscrowError(
						"GovernanceAlreadyInitialized",
						"Governance is already initialized",
					);
				}
				return config;
			}),
		);
	}

	async current(): Promise<GovernanceConfig> {
		const config = await this.unitOfWork.run((scope) =>
			scope.governance.load(),
		);
		if (!config) throw notInitialized();
		return config;
	}

	async isInitialized(): Promise<boolean> {
		const config = await this.unitOfWork.run((scope) =>
			scope.governance.load(),
		);
		return config !== null;
	}

	updateFeeRate(caller: Identity, feeRateBps: number): Promise<GovernanceConfig> {
		return this.mutate((config) => updateFeeRate(config, caller, feeRateBps));
	}

	updateFeeCollector(
		caller: Identity,
		feeCollector: Identity,
	): Promise<GovernanceConfig> {
		return this.mutate((config) =>
			updateFeeCollector(config, caller, feeCollector),
		);
	}

	updateGovernance(
		caller: Identity,
		update: GovernanceUpdate,
	): Promise<GovernanceConfig> {
		return this.mutate((config) =>
			applyGovernanceUpdate(config, caller, update),
		);
	}

	transferGovernance(
		caller: Identity,
		newAuthority: Identity,
	): Promise<GovernanceConfig> {
		return this.mutate((config) =>
			transferGovernance(config, caller, newAuthority),
		);
	}

	private mutate(
		change: (config: GovernanceConfig) => GovernanceConfig,
	): Promise<GovernanceConfig> {
		return this.locks.runExclusive(GOVERNANCE_LOCK_KEY, () =>
			this.unitOfWork.run(async (scope) => {
				const config = await scope.governance.load();
				if (!config) throw notInitialized();
				const next = change(config);
				if (!(await scope.governance.compareAndSet(config.version, next))) {
					throw new OptionsEscrowError(
						"StaleGovernanceConfig",
						"Governance changed while the update was applied",
					);
				}
				return next;
			}),
		);
	}
}

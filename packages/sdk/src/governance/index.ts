export {
	FEE_POLICIES,
	type FeePolicy,
	DEFAULT_FEE_POLICY,
	type GovernanceConfig,
	type GovernanceInit,
	type GovernanceUpdate,
} from "./types.js";
export {
	createGovernanceConfig,
	assertAuthority,
	applyGovernanceUpdate,
	updateFeeRate,
	updateFeeCollector,
	transferGovernance,
	assertGovernanceFresh,
} from "./governance-rules.js";
export {
	type GovernanceManagerOptions,
	GovernanceManager,
} from "./governance-manager.js";

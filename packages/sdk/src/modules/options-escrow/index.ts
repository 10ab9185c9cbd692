/**
 * Options Escrow Module
 *
 * Collateralized, cash-settled call and put options between an
 * initializer (writer) and a holder.
 */

export {
	ESCROW_STATUSES,
	type EscrowStatus,
	type EscrowAction,
	type EscrowRecord,
	type InitializeEscrowParams,
	type DepositCollateralParams,
	type SettlementKind,
	type DisbursementKind,
	type Disbursement,
	type SettlementRecord,
	type SettlementOutcome,
} from "./types.js";
export {
	OPTIONS_ESCROW_STATE_MACHINE,
	escrowStateMachine,
	isFinalStatus,
	holdsCollateral,
} from "./escrow-state-machine.js";
export { type SettlementPlan, planSettlement } from "./settlement-plan.js";
export {
	type EscrowRegistryOptions,
	EscrowRegistry,
} from "./escrow-registry.js";

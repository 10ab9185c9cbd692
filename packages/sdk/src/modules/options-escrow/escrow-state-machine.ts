/**
 * Options Escrow State Machine Configuration
 */

import {
	ContractStateMachine,
	type StateMachineConfig,
	createState,
	createTransition,
} from "../../contracts/index.js";
import type { EscrowAction, EscrowStatus } from "./types.js";

export const OPTIONS_ESCROW_STATE_MACHINE: StateMachineConfig<
	EscrowStatus,
	EscrowAction
> = {
	initialState: "created",
	states: [
		createState<EscrowStatus, EscrowAction>("created", ["deposit", "cancel"], {
			description: "Terms recorded, waiting for collateral",
		}),
		createState<EscrowStatus, EscrowAction>(
			"collateralized",
			["exercise", "settle"],
			{ description: "Collateral locked, option live" },
		),
		createState<EscrowStatus, EscrowAction>("exercised", ["settle"], {
			description: "Early exercise accepted, disbursing",
		}),
		createState<EscrowStatus, EscrowAction>("settled", [], {
			isFinal: true,
			description: "Collateral disbursed",
		}),
		createState<EscrowStatus, EscrowAction>("cancelled", [], {
			isFinal: true,
			description: "Withdrawn before collateralization",
		}),
	],
	transitions: [
		createTransition("created", "deposit", "collateralized"),
		createTransition("created", "cancel", "cancelled"),
		createTransition("collateralized", "exercise", "exercised"),
		createTransition(["collateralized", "exercised"], "settle", "settled"),
	],
};

export function escrowStateMachine(
	status: EscrowStatus,
): ContractStateMachine<EscrowStatus, EscrowAction> {
	return new ContractStateMachine(OPTIONS_ESCROW_STATE_MACHINE, status);
}

/**
 * Check if state is terminal.
 */
export function isFinalStatus(status: EscrowStatus): boolean {
	return status === "settled" || status === "cancelled";
}

/**
 * Check if the escrow currently holds collateral.
 */
export function holdsCollateral(status: EscrowStatus): boolean {
	return status === "collateralized" || status === "exercised";
}

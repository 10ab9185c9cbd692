export type {
	StateDefinition,
	StateTransition,
	StateMachineConfig,
} from "./types.js";
export {
	ContractStateMachine,
	createState,
	createTransition,
} from "./state-machine.js";

/**
 * Contract layer types
 *
 * Types for defining contract state machines and lifecycle management.
 */

/**
 * Generic state definition for a contract state machine.
 */
export interface StateDefinition<TState extends string, TAction extends string> {
	/** The state name */
	name: TState;
	/** Actions allowed from this state */
	allowedActions: TAction[];
	/** Is this a terminal state (no further transitions)? */
	isFinal: boolean;
	/** Human-readable description of this state */
	description?: string;
}

/**
 * State transition definition.
 */
export interface StateTransition<
	TState extends string,
	TAction extends string,
> {
	/** Source state(s) for this transition */
	from: TState | TState[];
	/** Action that triggers this transition */
	action: TAction;
	/** Target state after transition */
	to: TState;
}

/**
 * State machine configuration.
 */
export interface StateMachineConfig<
	TState extends string,
	TAction extends string,
> {
	/** Initial state when contract is created */
	initialState: TState;
	/** All possible states */
	states: StateDefinition<TState, TAction>[];
	/** All possible transitions */
	transitions: StateTransition<TState, TAction>[];
}

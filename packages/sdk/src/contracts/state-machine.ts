/**
 * Contract State Machine
 *
 * A generic state machine for contract lifecycle states and transitions.
 * Operations consult it before writing so that only declared edges are
 * ever taken.
 */

import { OptionsEscrowError } from "../core/errors.js";
import type {
	StateDefinition,
	StateMachineConfig,
	StateTransition,
} from "./types.js";

/**
 * @example
 * ```typescript
 * const machine = new ContractStateMachine(OPTIONS_ESCROW_STATE_MACHINE, "created");
 * machine.perform("deposit");
 * machine.getState(); // "collateralized"
 * ```
 */
export class ContractStateMachine<
	TState extends string,
	TAction extends string,
> {
	private currentState: TState;
	private readonly stateMap: Map<TState, StateDefinition<TState, TAction>>;
	private readonly transitionMap: Map<string, StateTransition<TState, TAction>>;

	constructor(
		private readonly config: StateMachineConfig<TState, TAction>,
		initialState?: TState,
	) {
		this.stateMap = new Map();
		for (const state of config.states) {
			this.stateMap.set(state.name, state);
		}

		this.transitionMap = new Map();
		for (const transition of config.transitions) {
			const froms = Array.isArray(transition.from)
				? transition.from
				: [transition.from];
			for (const from of froms) {
				this.transitionMap.set(`${from}:${transition.action}`, transition);
			}
		}

		this.currentState = this.assertKnown(initialState ?? config.initialState);
	}

	getState(): TState {
		return this.currentState;
	}

	canPerform(action: TAction): boolean {
		const state = this.stateMap.get(this.currentState);
		return (
			(state?.allowedActions.includes(action) ?? false) &&
			this.transitionMap.has(`${this.currentState}:${action}`)
		);
	}

	getAllowedActions(): TAction[] {
		return this.stateMap.get(this.currentState)?.allowedActions ?? [];
	}

	/**
	 * Preview what state would result from an action without performing it.
	 */
	previewTransition(action: TAction): TState | undefined {
		return this.transitionMap.get(`${this.currentState}:${action}`)?.to;
	}

	/**
	 * Resolve the state an action leads to, without performing it.
	 *
	 * @throws OptionsEscrowError `InvalidState` if the action is not allowed
	 */
	assertAllowed(action: TAction): TState {
		const next = this.canPerform(action)
			? this.previewTransition(action)
			: undefined;
		if (next === undefined) {
			throw new OptionsEscrowError(
				"InvalidState",
				`Action "${action}" is not allowed from state "${this.currentState}"`,
				{
					action,
					currentState: this.currentState,
					allowedActions: this.getAllowedActions(),
				},
			);
		}
		return next;
	}

	/**
	 * Perform an action, transitioning state if valid.
	 *
	 * @returns The new state after transition
	 */
	perform(action: TAction): TState {
		this.currentState = this.assertAllowed(action);
		return this.currentState;
	}

	/**
	 * Check if the current state is a final (terminal) state.
	 */
	isFinal(): boolean {
		return this.stateMap.get(this.currentState)?.isFinal ?? false;
	}

	getFinalStates(): TState[] {
		return Array.from(this.stateMap.values())
			.filter((s) => s.isFinal)
			.map((s) => s.name);
	}

	private assertKnown(state: TState): TState {
		if (!this.stateMap.has(state)) {
			throw new OptionsEscrowError("InvalidState", `Unknown state: ${state}`, {
				state,
				validStates: Array.from(this.stateMap.keys()),
			});
		}
		return state;
	}
}

/**
 * Helper to create a state definition.
 */
export function createState<TState extends string, TAction extends string>(
	name: TState,
	allowedActions: TAction[],
	options: { isFinal?: boolean; description?: string } = {},
): StateDefinition<TState, TAction> {
	return {
		name,
		allowedActions,
		isFinal: options.isFinal ?? false,
		description: options.description,
	};
}

/**
 * Helper to create a state transition.
 */
export function createTransition<TState extends string, TAction extends string>(
	from: TState | TState[],
	action: TAction,
	to: TState,
): StateTransition<TState, TAction> {
	return { from, action, to };
}

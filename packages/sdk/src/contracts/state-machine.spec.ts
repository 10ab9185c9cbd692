import { isOptionsEscrowError } from "../core/errors";
import {
	ContractStateMachine,
	createState,
	createTransition,
} from "./state-machine";
import type { StateMachineConfig } from "./types";

type DoorState = "open" | "closed" | "locked" | "removed";
type DoorAction = "close" | "open" | "lock" | "remove";

const DOOR: StateMachineConfig<DoorState, DoorAction> = {
	initialState: "open",
	states: [
		createState<DoorState, DoorAction>("open", ["close", "remove"]),
		createState<DoorState, DoorAction>("closed", ["open", "lock", "remove"]),
		createState<DoorState, DoorAction>("locked", []),
		createState<DoorState, DoorAction>("removed", [], { isFinal: true }),
	],
	transitions: [
		createTransition("open", "close", "closed"),
		createTransition("closed", "open", "open"),
		createTransition("closed", "lock", "locked"),
		createTransition(["open", "closed"], "remove", "removed"),
	],
};

describe("ContractStateMachine", () => {
	it("starts in the initial state unless told otherwise", () => {
		expect(new ContractStateMachine(DOOR).getState()).toBe("open");
		expect(new ContractStateMachine(DOOR, "locked").getState()).toBe("locked");
	});

	it("follows declared transitions", () => {
		const machine = new ContractStateMachine(DOOR);
		expect(machine.perform("close")).toBe("closed");
		expect(machine.perform("lock")).toBe("locked");
		expect(machine.getAllowedActions()).toEqual([]);
	});

	it("expands multi-source transitions", () => {
		expect(new ContractStateMachine(DOOR, "open").previewTransition("remove")).toBe(
			"removed",
		);
		expect(
			new ContractStateMachine(DOOR, "closed").previewTransition("remove"),
		).toBe("removed");
	});

	it("refuses undeclared actions without moving", () => {
		const machine = new ContractStateMachine(DOOR);
		expect.assertions(3);
		try {
			machine.perform("lock");
		} catch (error) {
			expect(isOptionsEscrowError(error, "InvalidState")).toBe(true);
			expect(isOptionsEscrowError(error) && error.details).toEqual({
				action: "lock",
				currentState: "open",
				allowedActions: ["close", "remove"],
			});
		}
		expect(machine.getState()).toBe("open");
	});

	it("reports final states", () => {
		const machine = new ContractStateMachine(DOOR, "removed");
		expect(machine.isFinal()).toBe(true);
		expect(machine.getFinalStates()).toEqual(["removed"]);
	});
});

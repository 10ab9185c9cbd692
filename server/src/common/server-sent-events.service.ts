import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Observable, Subject } from "rxjs";
import type { EscrowStatus } from "@options-escrow/sdk";
import {
	ESCROW_CANCELLED_ID,
	ESCROW_COLLATERALIZED_ID,
	ESCROW_INITIALIZED_ID,
	ESCROW_SETTLED_ID,
	type EscrowCancelled,
	type EscrowCollateralized,
	type EscrowInitialized,
	type EscrowSettled,
} from "./escrow.event";
import {
	GOVERNANCE_UPDATED_ID,
	type GovernanceUpdated,
} from "./governance.event";

export type EscrowSse =
	| { type: "new_escrow"; escrowId: string }
	| { type: "escrow_updated"; escrowId: string; status: EscrowStatus }
	| { type: "governance_updated"; version: number };

export type SseEvent<T = EscrowSse> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<EscrowSse>();

	get allEvents(): Observable<EscrowSse> {
		return this.events$.asObservable();
	}

	escrowEvents(id: string): Observable<EscrowSse> {
		return this.events$.pipe(
			filter((e) => "escrowId" in e && e.escrowId === id),
		);
	}

	@OnEvent(ESCROW_INITIALIZED_ID)
	onEscrowInitialized(evt: EscrowInitialized) {
		this.events$.next({ type: "new_escrow", escrowId: evt.escrowId });
	}

	@OnEvent(ESCROW_COLLATERALIZED_ID)
	onEscrowCollateralized(evt: EscrowCollateralized) {
		this.events$.next({
			type: "escrow_updated",
			escrowId: evt.escrowId,
			status: "collateralized",
		});
	}

	@OnEvent(ESCROW_SETTLED_ID)
	onEscrowSettled(evt: EscrowSettled) {
		this.events$.next({
			type: "escrow_updated",
			escrowId: evt.escrowId,
			status: "settled",
		});
	}

	@OnEvent(ESCROW_CANCELLED_ID)
	onEscrowCancelled(evt: EscrowCancelled) {
		this.events$.next({
			type: "escrow_updated",
			escrowId: evt.escrowId,
			status: "cancelled",
		});
	}

	@OnEvent(GOVERNANCE_UPDATED_ID)
	onGovernanceUpdated(evt: GovernanceUpdated) {
		this.events$.next({ type: "governance_updated", version: evt.version });
	}
}

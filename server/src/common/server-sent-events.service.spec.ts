import { firstValueFrom, take, toArray } from "rxjs";
import { ServerSentEventsService } from "./server-sent-events.service";

describe("ServerSentEventsService", () => {
	it("republishes the lifecycle of one escrow", async () => {
		const service = new ServerSentEventsService();
		const received = firstValueFrom(
			service.escrowEvents("e1").pipe(take(3), toArray()),
		);

		service.onEscrowInitialized({
			eventId: "a",
			escrowId: "e1",
			initializer: "writer",
			counterparty: null,
			createdAt: 1,
		});
		service.onEscrowInitialized({
			eventId: "b",
			escrowId: "e2",
			initializer: "writer",
			counterparty: null,
			createdAt: 1,
		});
		service.onGovernanceUpdated({
			eventId: "c",
			authority: "dao",
			feeRateBps: 10,
			feeCollector: "treasury",
			feePolicy: "itm-payoff",
			version: 2,
		});
		service.onEscrowCollateralized({
			eventId: "d",
			escrowId: "e1",
			asset: "USDC",
			amount: "1000",
			lockReceipt: "r1",
		});
		service.onEscrowSettled({
			eventId: "e",
			escrowId: "e1",
			kind: "expiry",
			moneyness: "itm",
			holder: "holder",
			payoff: "200",
			fee: "2",
			settledAt: 2,
		});

		expect(await received).toEqual([
			{ type: "new_escrow", escrowId: "e1" },
			{ type: "escrow_updated", escrowId: "e1", status: "collateralized" },
			{ type: "escrow_updated", escrowId: "e1", status: "settled" },
		]);
	});
});

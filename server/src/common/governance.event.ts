import type { FeePolicy } from "@options-escrow/sdk";

export const GOVERNANCE_UPDATED_ID = "governance.updated";
export type GovernanceUpdated = {
	eventId: string;
	authority: string;
	feeRateBps: number;
	feeCollector: string;
	feePolicy: FeePolicy;
	version: number;
};

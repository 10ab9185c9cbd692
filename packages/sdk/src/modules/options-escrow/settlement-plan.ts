import { checkedAdd, checkedSub } from "../../core/checked-math.js";
import type { Amount, Identity } from "../../core/types.js";
import { calculateFee } from "../../fees/fee-calculator.js";
import type { GovernanceConfig } from "../../governance/types.js";
import { computePayoff } from "../../settlement/settlement-engine.js";
import type { Moneyness } from "../../settlement/types.js";
import type { Disbursement, EscrowRecord } from "./types.js";

export interface SettlementPlan {
	moneyness: Moneyness;
	rawPayoff: bigint;
	payoff: Amount;
	holderAmount: Amount;
	initializerAmount: Amount;
	fee: Amount;
	/** Non-zero transfers only; amounts sum to the locked collateral. */
	disbursements: Disbursement[];
}

/**
 * Splits the locked collateral between holder, initializer and fee collector.
 */
export function planSettlement(
	escrow: EscrowRecord,
	spotPrice: Amount,
	holder: Identity,
	governance: GovernanceConfig,
): SettlementPlan {
	const result = computePayoff({
		optionType: escrow.optionType,
		strikePrice: escrow.strikePrice,
		notional: escrow.notional,
		spotPrice,
		collateralAmount: escrow.collateralAmount,
	});

	const payoutFee = calculateFee(result.payoff, governance.feeRateBps);
	const residualFee =
		governance.feePolicy === "all-disbursements"
			? calculateFee(result.residual, governance.feeRateBps)
			: 0n;

	const holderAmount = checkedSub(result.payoff, payoutFee);
	const initializerAmount = checkedSub(result.residual, residualFee);
	const fee = checkedAdd(payoutFee, residualFee);

	const disbursements: Disbursement[] = [
		{ kind: "payout" as const, recipient: holder, amount: holderAmount },
		{
			kind: "residual" as const,
			recipient: escrow.initializer,
			amount: initializerAmount,
		},
		{ kind: "fee" as const, recipient: governance.feeCollector, amount: fee },
	].filter((d) => d.amount > 0n);

	return {
		moneyness: result.moneyness,
		rawPayoff: result.rawPayoff,
		payoff: result.payoff,
		holderAmount,
		initializerAmount,
		fee,
		disbursements,
	};
}

import { ApiProperty } from "@nestjs/swagger";
import {
	FEE_POLICIES,
	type DisbursementKind,
	type FeePolicy,
	type Moneyness,
	type SettlementKind,
} from "@options-escrow/sdk";
import { GetEscrowDto } from "./get-escrow.dto";

export class GetSettlementDto {
	@ApiProperty()
	escrowId!: string;

	@ApiProperty({ enum: ["exercise", "expiry"] })
	kind!: SettlementKind;

	@ApiProperty({ example: "120" })
	spotPrice!: string;

	@ApiProperty({ enum: ["itm", "otm"] })
	moneyness!: Moneyness;

	@ApiProperty({ description: "Intrinsic value before clamping" })
	rawPayoff!: string;

	@ApiProperty()
	payoff!: string;

	@ApiProperty()
	holder!: string;

	@ApiProperty()
	holderAmount!: string;

	@ApiProperty()
	initializerAmount!: string;

	@ApiProperty()
	fee!: string;

	@ApiProperty()
	feeCollector!: string;

	@ApiProperty()
	feeRateBps!: number;

	@ApiProperty({ enum: FEE_POLICIES })
	feePolicy!: FeePolicy;

	@ApiProperty()
	governanceVersion!: number;

	@ApiProperty()
	settledAt!: number;
}

export class DisbursementDto {
	@ApiProperty({ enum: ["payout", "residual", "fee"] })
	kind!: DisbursementKind;

	@ApiProperty()
	recipient!: string;

	@ApiProperty()
	amount!: string;
}

export class SettlementOutcomeDto {
	@ApiProperty({ type: GetEscrowDto })
	escrow!: GetEscrowDto;

	@ApiProperty({ type: GetSettlementDto })
	settlement!: GetSettlementDto;

	@ApiProperty({ type: DisbursementDto, isArray: true })
	disbursements!: DisbursementDto[];
}

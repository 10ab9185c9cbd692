import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
} from "typeorm";
import {
	FEE_POLICIES,
	type FeePolicy,
	type Moneyness,
	type SettlementKind,
} from "@options-escrow/sdk";
import { bigintTransformer } from "../common/transformers/bigint.transformer";

@Entity("escrow_settlements")
export class EscrowSettlement {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	escrowId!: string;

	@Column({ type: "text", enum: ["exercise", "expiry"] })
	kind!: SettlementKind;

	@Column({ type: "text", transformer: bigintTransformer })
	spotPrice!: bigint;

	@Column({ type: "text", enum: ["itm", "otm"] })
	moneyness!: Moneyness;

	// may exceed u64 when the payoff was clamped
	@Column({ type: "text", transformer: bigintTransformer })
	rawPayoff!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	payoff!: bigint;

	@Column({ type: "text" })
	holder!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	holderAmount!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	initializerAmount!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	fee!: bigint;

	@Column({ type: "text" })
	feeCollector!: string;

	@Column({ type: "integer" })
	feeRateBps!: number;

	@Column({ type: "text", enum: FEE_POLICIES })
	feePolicy!: FeePolicy;

	@Column({ type: "integer" })
	governanceVersion!: number;

	@Column({ type: "integer" })
	settledAt!: number;

	@CreateDateColumn()
	insertedAt!: Date;
}

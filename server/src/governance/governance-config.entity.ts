import { Column, Entity, PrimaryColumn, UpdateDateColumn } from "typeorm";
import { FEE_POLICIES, type FeePolicy } from "@options-escrow/sdk";

export const GOVERNANCE_KEY = "governance";

/** Singleton row keyed by {@link GOVERNANCE_KEY}. */
@Entity("governance_config")
export class GovernanceConfigEntity {
	@PrimaryColumn({ type: "text" })
	key!: string;

	@Column({ type: "text" })
	authority!: string;

	@Column({ type: "integer" })
	feeRateBps!: number;

	@Column({ type: "text" })
	feeCollector!: string;

	@Column({ type: "text", enum: FEE_POLICIES })
	feePolicy!: FeePolicy;

	@Column({ type: "integer" })
	version!: number;

	@UpdateDateColumn()
	updatedAt!: Date;
}

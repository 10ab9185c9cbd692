import {
	Column,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../common/transformers/bigint.transformer";

/**
 * Collateral held on behalf of one escrow. Kept apart from `vault_accounts`
 * so no caller identity can address it.
 */
@Entity("escrow_custody")
@Index(["escrowId", "asset"], { unique: true })
export class EscrowCustody {
	@PrimaryGeneratedColumn()
	id!: number;

	@Column({ type: "text" })
	escrowId!: string;

	@Column({ type: "text" })
	asset!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	balance!: bigint;

	@UpdateDateColumn()
	updatedAt!: Date;
}

import {
	Column,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../common/transformers/bigint.transformer";

/**
 * Free balance of a holder in one asset.
 */
@Entity("vault_accounts")
@Index(["holder", "asset"], { unique: true })
export class VaultAccount {
	@PrimaryGeneratedColumn()
	id!: number;

	@Column({ type: "text" })
	holder!: string;

	@Column({ type: "text" })
	asset!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	balance!: bigint;

	@UpdateDateColumn()
	updatedAt!: Date;
}

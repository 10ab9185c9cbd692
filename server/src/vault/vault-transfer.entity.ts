import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
} from "typeorm";
import type { VaultTransferKind } from "@options-escrow/sdk";
import { bigintTransformer } from "../common/transformers/bigint.transformer";

@Entity("vault_transfers")
export class VaultTransfer {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	receiptId!: string;

	@Index({ unique: true })
	@Column({ type: "text" })
	idempotencyKey!: string;

	@Column({ type: "text", enum: ["lock", "release"] })
	kind!: VaultTransferKind;

	@Index()
	@Column({ type: "text" })
	escrowId!: string;

	@Column({ type: "text" })
	party!: string;

	@Column({ type: "text" })
	asset!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	amount!: bigint;

	@CreateDateColumn()
	createdAt!: Date;
}

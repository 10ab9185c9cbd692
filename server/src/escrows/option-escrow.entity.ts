import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import {
	ESCROW_STATUSES,
	EXERCISE_STYLES,
	OPTION_TYPES,
	type EscrowStatus,
	type ExerciseStyle,
	type OptionType,
} from "@options-escrow/sdk";
import { bigintTransformer } from "../common/transformers/bigint.transformer";

@Entity("option_escrows")
export class OptionEscrow {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Index()
	@Column({ type: "text" })
	initializer!: string;

	// null: open to whoever settles first
	@Index()
	@Column({ type: "text", nullable: true })
	counterparty!: string | null;

	@Column({ type: "text", enum: OPTION_TYPES })
	optionType!: OptionType;

	@Column({ type: "text", enum: EXERCISE_STYLES })
	style!: ExerciseStyle;

	@Column({ type: "text", transformer: bigintTransformer })
	strikePrice!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	notional!: bigint;

	@Column({ type: "integer" })
	expirationTime!: number;

	@Column({ type: "text" })
	collateralAsset!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	collateralAmount!: bigint;

	@Index()
	@Column({ type: "text", enum: ESCROW_STATUSES })
	status!: EscrowStatus;

	/** Unix seconds supplied by the caller that created the escrow. */
	@Index()
	@Column({ type: "integer" })
	createdAt!: number;

	@Column({ type: "integer" })
	version!: number;

	@Column({ type: "text", nullable: true })
	lockReceipt!: string | null;

	@Column({ type: "integer", nullable: true })
	settledAt!: number | null;

	@Column({ type: "integer", nullable: true })
	cancelledAt!: number | null;

	@CreateDateColumn()
	insertedAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}

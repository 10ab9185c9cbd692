import { ApiProperty } from "@nestjs/swagger";
import {
	ESCROW_STATUSES,
	EXERCISE_STYLES,
	OPTION_TYPES,
	type EscrowAction,
	type EscrowStatus,
	type ExerciseStyle,
	type OptionType,
} from "@options-escrow/sdk";

export class GetEscrowDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	id!: string;

	@ApiProperty()
	initializer!: string;

	@ApiProperty({ nullable: true, type: String })
	counterparty!: string | null;

	@ApiProperty({ enum: OPTION_TYPES })
	optionType!: OptionType;

	@ApiProperty({ enum: EXERCISE_STYLES })
	style!: ExerciseStyle;

	@ApiProperty({ example: "100" })
	strikePrice!: string;

	@ApiProperty({ example: "10" })
	notional!: string;

	@ApiProperty({ example: 1700086400 })
	expirationTime!: number;

	@ApiProperty({ example: "USDC" })
	collateralAsset!: string;

	@ApiProperty({ example: "1000" })
	collateralAmount!: string;

	@ApiProperty({ enum: ESCROW_STATUSES })
	status!: EscrowStatus;

	@ApiProperty({
		enum: ["deposit", "exercise", "settle", "cancel"],
		isArray: true,
		description: "Actions the current status accepts",
	})
	allowedActions!: EscrowAction[];

	@ApiProperty()
	createdAt!: number;

	@ApiProperty()
	version!: number;

	@ApiProperty({ nullable: true, type: String })
	lockReceipt!: string | null;

	@ApiProperty({ nullable: true, type: Number })
	settledAt!: number | null;

	@ApiProperty({ nullable: true, type: Number })
	cancelledAt!: number | null;
}

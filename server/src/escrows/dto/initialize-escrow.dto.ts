import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import {
	IsIn,
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Matches,
	Min,
} from "class-validator";
import {
	EXERCISE_STYLES,
	OPTION_TYPES,
	type ExerciseStyle,
	type OptionType,
} from "@options-escrow/sdk";
import { AMOUNT_PATTERN } from "./amount";

export class InitializeEscrowInDto {
	@ApiProperty({ enum: OPTION_TYPES, example: "call" })
	@IsIn(OPTION_TYPES)
	optionType!: OptionType;

	@ApiProperty({ enum: EXERCISE_STYLES, example: "american" })
	@IsIn(EXERCISE_STYLES)
	style!: ExerciseStyle;

	@ApiProperty({
		example: "100",
		description: "Strike in quote units, decimal string (u64)",
	})
	@IsString()
	@Matches(AMOUNT_PATTERN)
	strikePrice!: string;

	@ApiProperty({ example: "10", description: "Contract size, decimal string" })
	@IsString()
	@Matches(AMOUNT_PATTERN)
	notional!: string;

	@ApiProperty({ example: 1700086400, description: "Unix seconds" })
	@IsInt()
	@Min(0)
	expirationTime!: number;

	@ApiProperty({ example: "USDC" })
	@IsString()
	@IsNotEmpty()
	collateralAsset!: string;

	@ApiPropertyOptional({
		description: "Holder identity; omit to let the first settler claim it",
	})
	@IsOptional()
	@IsString()
	@IsNotEmpty()
	counterparty?: string;

	@ApiPropertyOptional({
		example: 1700000000,
		description: "Override for the server clock, unix seconds",
	})
	@IsOptional()
	@IsInt()
	@Min(0)
	now?: number;
}

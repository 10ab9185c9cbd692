import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { IsInt, IsOptional, IsString, Matches, Min } from "class-validator";
import { AMOUNT_PATTERN } from "./amount";

export class SettleEscrowInDto {
	@ApiProperty({ example: "120", description: "Oracle spot price" })
	@IsString()
	@Matches(AMOUNT_PATTERN)
	spotPrice!: string;

	@ApiPropertyOptional({ description: "Override for the server clock" })
	@IsOptional()
	@IsInt()
	@Min(0)
	now?: number;
}

export class CancelEscrowInDto {
	@ApiPropertyOptional({ description: "Override for the server clock" })
	@IsOptional()
	@IsInt()
	@Min(0)
	now?: number;
}

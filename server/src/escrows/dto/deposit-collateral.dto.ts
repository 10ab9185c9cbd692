import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { IsNotEmpty, IsOptional, IsString, Matches } from "class-validator";
import { AMOUNT_PATTERN } from "./amount";

export class DepositCollateralInDto {
	@ApiProperty({ example: "1000" })
	@IsString()
	@Matches(AMOUNT_PATTERN)
	amount!: string;

	@ApiProperty({ example: "USDC" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@ApiPropertyOptional({
		example: "1000",
		description: "Collateral cap, required for calls",
	})
	@IsOptional()
	@IsString()
	@Matches(AMOUNT_PATTERN)
	maxCollateral?: string;
}

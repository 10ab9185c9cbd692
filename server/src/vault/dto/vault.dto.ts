import { ApiProperty } from "@nestjs/swagger";
import { IsNotEmpty, IsString, Matches } from "class-validator";
import { AMOUNT_PATTERN } from "../../escrows/dto/amount";

export class GetBalanceDto {
	@ApiProperty()
	holder!: string;

	@ApiProperty({ example: "USDC" })
	asset!: string;

	@ApiProperty({ example: "10000" })
	balance!: string;
}

export class CreditAccountInDto {
	@ApiProperty({ example: "writer" })
	@IsString()
	@IsNotEmpty()
	holder!: string;

	@ApiProperty({ example: "USDC" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@ApiProperty({ example: "10000" })
	@IsString()
	@Matches(AMOUNT_PATTERN)
	amount!: string;
}

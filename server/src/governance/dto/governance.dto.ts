import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import {
	IsIn,
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Max,
	Min,
} from "class-validator";
import { FEE_POLICIES, MAX_FEE_BPS, type FeePolicy } from "@options-escrow/sdk";

export class GetGovernanceDto {
	@ApiProperty()
	authority!: string;

	@ApiProperty({ example: 100, description: "Fee in basis points" })
	feeRateBps!: number;

	@ApiProperty()
	feeCollector!: string;

	@ApiProperty({ enum: FEE_POLICIES })
	feePolicy!: FeePolicy;

	@ApiProperty({ example: 1 })
	version!: number;
}

export class InitializeGovernanceInDto {
	@ApiProperty({ example: 100, minimum: 0, maximum: MAX_FEE_BPS })
	@IsInt()
	@Min(0)
	@Max(MAX_FEE_BPS)
	feeRateBps!: number;

	@ApiProperty({ example: "treasury" })
	@IsString()
	@IsNotEmpty()
	feeCollector!: string;

	@ApiPropertyOptional({ enum: FEE_POLICIES })
	@IsOptional()
	@IsIn(FEE_POLICIES)
	feePolicy?: FeePolicy;
}

export class UpdateGovernanceInDto {
	@ApiPropertyOptional({ minimum: 0, maximum: MAX_FEE_BPS })
	@IsOptional()
	@IsInt()
	@Min(0)
	@Max(MAX_FEE_BPS)
	feeRateBps?: number;

	@ApiPropertyOptional()
	@IsOptional()
	@IsString()
	@IsNotEmpty()
	feeCollector?: string;

	@ApiPropertyOptional({ enum: FEE_POLICIES })
	@IsOptional()
	@IsIn(FEE_POLICIES)
	feePolicy?: FeePolicy;
}

export class UpdateFeeRateInDto {
	@ApiProperty({ example: 50 })
	@IsInt()
	feeRateBps!: number;
}

export class UpdateFeeCollectorInDto {
	@ApiProperty({ example: "treasury" })
	@IsString()
	@IsNotEmpty()
	feeCollector!: string;
}

export class TransferGovernanceInDto {
	@ApiProperty({ example: "new-dao" })
	@IsString()
	@IsNotEmpty()
	newAuthority!: string;
}

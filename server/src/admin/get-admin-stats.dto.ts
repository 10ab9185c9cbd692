import { ApiProperty } from "@nestjs/swagger";

type EscrowStats = {
	total: number;
	open: number;
	holdingCollateral: number;
	settled: number;
	cancelled: number;
};

export class GetAdminStatsDto {
	@ApiProperty({ description: "Escrow counts by lifecycle stage" })
	escrows!: EscrowStats;
}

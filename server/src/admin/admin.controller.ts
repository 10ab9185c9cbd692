import { Body, Controller, Get, Post } from "@nestjs/common";
import {
	ApiBasicAuth,
	ApiBody,
	ApiCreatedResponse,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
} from "@nestjs/swagger";
import { parseAmount } from "@options-escrow/sdk";
import {
	type ApiEnvelope,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { VaultService } from "../vault/vault.service";
import { CreditAccountInDto, GetBalanceDto } from "../vault/dto/vault.dto";
import { AdminService } from "./admin.service";
import { GetAdminStatsDto } from "./get-admin-stats.dto";

@ApiTags("Admin")
@ApiBasicAuth()
@Controller("api/admin/v1")
export class AdminController {
	constructor(
		private readonly adminService: AdminService,
		private readonly vaultService: VaultService,
	) {}

	@Get("stats")
	@ApiOperation({ summary: "Escrow counts" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetAdminStatsDto) })
	async stats(): Promise<ApiEnvelope<GetAdminStatsDto>> {
		return envelope({ escrows: await this.adminService.getEscrowStats() });
	}

	@Post("vault/credit")
	@ApiOperation({ summary: "Fund a holder's free balance" })
	@ApiBody({ type: CreditAccountInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(GetBalanceDto) })
	async credit(
		@Body() dto: CreditAccountInDto,
	): Promise<ApiEnvelope<GetBalanceDto>> {
		return envelope(
			await this.vaultService.credit(
				dto.holder,
				dto.asset,
				parseAmount(dto.amount, "amount"),
			),
		);
	}
}

import { Controller, Get, Param, UseGuards } from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiExtraModels,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
} from "@nestjs/swagger";
import { AuthGuard } from "../auth/auth.guard";
import { CallerFromJwt } from "../auth/caller.decorator";
import {
	type ApiEnvelope,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { VaultService } from "./vault.service";
import { GetBalanceDto } from "./dto/vault.dto";

@ApiTags("3 - Vault")
@ApiExtraModels(GetBalanceDto)
@Controller("api/v1/vault")
export class VaultController {
	constructor(private readonly service: VaultService) {}

	@Get("balances/:asset")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Caller's free balance in one asset" })
	@ApiParam({ name: "asset", example: "USDC" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetBalanceDto) })
	async balance(
		@CallerFromJwt() caller: string,
		@Param("asset") asset: string,
	): Promise<ApiEnvelope<GetBalanceDto>> {
		return envelope(await this.service.balanceOf(caller, asset));
	}
}

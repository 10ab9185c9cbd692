import {
	Body,
	Controller,
	Get,
	HttpCode,
	Patch,
	Post,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiOkResponse,
	ApiOperation,
	ApiServiceUnavailableResponse,
	ApiTags,
} from "@nestjs/swagger";
import { AuthGuard } from "../auth/auth.guard";
import { CallerFromJwt } from "../auth/caller.decorator";
import {
	type ApiEnvelope,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { GovernanceService } from "./governance.service";
import {
	GetGovernanceDto,
	InitializeGovernanceInDto,
	TransferGovernanceInDto,
	UpdateFeeCollectorInDto,
	UpdateFeeRateInDto,
	UpdateGovernanceInDto,
} from "./dto/governance.dto";

@ApiTags("2 - Governance")
@ApiExtraModels(GetGovernanceDto)
@Controller("api/v1/governance")
export class GovernanceController {
	constructor(private readonly service: GovernanceService) {}

	@Get("")
	@ApiOperation({ summary: "Current fee configuration" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetGovernanceDto) })
	@ApiServiceUnavailableResponse({ description: "Not initialized yet" })
	async get(): Promise<ApiEnvelope<GetGovernanceDto>> {
		return envelope(await this.service.current());
	}

	@Post("")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Create the configuration; caller becomes authority" })
	@ApiBody({ type: InitializeGovernanceInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(GetGovernanceDto) })
	@ApiConflictResponse({ description: "Already initialized" })
	async initialize(
		@CallerFromJwt() caller: string,
		@Body() dto: InitializeGovernanceInDto,
	): Promise<ApiEnvelope<GetGovernanceDto>> {
		return envelope(await this.service.initialize(caller, dto));
	}

	@Patch("")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@HttpCode(200)
	@ApiOperation({ summary: "Update several fields in one version bump" })
	@ApiBody({ type: UpdateGovernanceInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetGovernanceDto) })
	@ApiForbiddenResponse({ description: "Caller is not the authority" })
	async update(
		@CallerFromJwt() caller: string,
		@Body() dto: UpdateGovernanceInDto,
	): Promise<ApiEnvelope<GetGovernanceDto>> {
		return envelope(await this.service.update(caller, dto));
	}

	@Patch("fee-rate")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@HttpCode(200)
	@ApiOperation({ summary: "Change the fee rate" })
	@ApiBody({ type: UpdateFeeRateInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetGovernanceDto) })
	@ApiForbiddenResponse({ description: "Caller is not the authority" })
	async updateFeeRate(
		@CallerFromJwt() caller: string,
		@Body() dto: UpdateFeeRateInDto,
	): Promise<ApiEnvelope<GetGovernanceDto>> {
		return envelope(await this.service.updateFeeRate(caller, dto.feeRateBps));
	}

	@Patch("fee-collector")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@HttpCode(200)
	@ApiOperation({ summary: "Change the fee collector" })
	@ApiBody({ type: UpdateFeeCollectorInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetGovernanceDto) })
	@ApiForbiddenResponse({ description: "Caller is not the authority" })
	async updateFeeCollector(
		@CallerFromJwt() caller: string,
		@Body() dto: UpdateFeeCollectorInDto,
	): Promise<ApiEnvelope<GetGovernanceDto>> {
		return envelope(
			await this.service.updateFeeCollector(caller, dto.feeCollector),
		);
	}

	@Post("transfer")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@HttpCode(200)
	@ApiOperation({ summary: "Hand authority to another identity" })
	@ApiBody({ type: TransferGovernanceInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetGovernanceDto) })
	@ApiForbiddenResponse({ description: "Caller is not the authority" })
	async transfer(
		@CallerFromJwt() caller: string,
		@Body() dto: TransferGovernanceInDto,
	): Promise<ApiEnvelope<GetGovernanceDto>> {
		return envelope(await this.service.transfer(caller, dto.newAuthority));
	}
}

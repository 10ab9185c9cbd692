import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	Inject,
	NotFoundException,
	Param,
	ParseIntPipe,
	Patch,
	Post,
	Query,
	Sse,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { map, type Observable } from "rxjs";
import { ESCROW_STATUSES, type EscrowStatus, parseAmount } from "@options-escrow/sdk";
import { EscrowsService } from "./escrows.service";
import {
	type ApiEnvelope,
	type ApiPaginatedEnvelope,
	type Cursor,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import { ParseCursorPipe } from "../common/pipes/cursor.pipe";
import { AuthGuard } from "../auth/auth.guard";
import { CallerFromJwt } from "../auth/caller.decorator";
import { CLOCK, type Clock } from "../common/clock";
import {
	ServerSentEventsService,
	type SseEvent,
} from "../common/server-sent-events.service";
import { GetEscrowDto } from "./dto/get-escrow.dto";
import {
	GetSettlementDto,
	SettlementOutcomeDto,
} from "./dto/get-settlement.dto";
import { InitializeEscrowInDto } from "./dto/initialize-escrow.dto";
import { DepositCollateralInDto } from "./dto/deposit-collateral.dto";
import { CancelEscrowInDto, SettleEscrowInDto } from "./dto/settle-escrow.dto";

@ApiTags("1 - Option Escrows")
@ApiExtraModels(GetEscrowDto, GetSettlementDto, SettlementOutcomeDto)
@Controller("api/v1/escrows")
export class EscrowsController {
	constructor(
		private readonly service: EscrowsService,
		private readonly sseService: ServerSentEventsService,
		@Inject(CLOCK) private readonly clock: Clock,
	) {}

	@Post("")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Record the terms of a new option escrow" })
	@ApiBody({ type: InitializeEscrowInDto })
	@ApiCreatedResponse({
		description: "Escrow created, awaiting collateral",
		schema: getSchemaPathForDto(GetEscrowDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	async create(
		@CallerFromJwt() caller: string,
		@Body() dto: InitializeEscrowInDto,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		const escrow = await this.service.initialize(
			caller,
			{
				optionType: dto.optionType,
				style: dto.style,
				strikePrice: parseAmount(dto.strikePrice, "strikePrice"),
				notional: parseAmount(dto.notional, "notional"),
				expirationTime: dto.expirationTime,
				collateralAsset: dto.collateralAsset,
				counterparty: dto.counterparty,
			},
			dto.now ?? this.clock(),
		);
		return envelope(escrow);
	}

	@Get("")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "List escrows where the caller is a party" })
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1-100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiQuery({
		name: "cursor",
		required: false,
		description: "Opaque cursor from previous page",
		schema: { type: "string" },
	})
	@ApiQuery({
		name: "status",
		required: false,
		schema: { type: "string", enum: ESCROW_STATUSES.slice(0) },
	})
	@ApiQuery({
		name: "role",
		required: false,
		schema: { type: "string", enum: ["initializer", "counterparty"] },
	})
	@ApiOkResponse({
		description: "A page of escrows",
		schema: getSchemaPathForPaginatedDto(GetEscrowDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	async getMine(
		@CallerFromJwt() caller: string,
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
		@Query("status") status?: EscrowStatus,
		@Query("role") role?: "initializer" | "counterparty",
	): Promise<ApiPaginatedEnvelope<GetEscrowDto[]>> {
		const { items, nextCursor, total } = await this.service.getByCaller(
			caller,
			{ status, role },
			limit,
			cursor,
		);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Get(":escrowId")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Retrieve an escrow" })
	@ApiParam({ name: "escrowId", description: "Escrow id" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiNotFoundResponse({ description: "Escrow not found" })
	async getOne(
		@Param("escrowId") escrowId: string,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		return envelope(await this.service.getOne(escrowId));
	}

	@Patch(":escrowId/deposit")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@HttpCode(200)
	@ApiOperation({ summary: "Initializer locks collateral in the vault" })
	@ApiParam({ name: "escrowId", description: "Escrow id" })
	@ApiBody({ type: DepositCollateralInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiForbiddenResponse({ description: "Caller is not the initializer" })
	@ApiConflictResponse({ description: "Escrow is not awaiting collateral" })
	@ApiUnprocessableEntityResponse({ description: "Collateral too small" })
	async deposit(
		@CallerFromJwt() caller: string,
		@Param("escrowId") escrowId: string,
		@Body() dto: DepositCollateralInDto,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		const escrow = await this.service.deposit(caller, escrowId, {
			amount: parseAmount(dto.amount, "amount"),
			asset: dto.asset,
			maxCollateral:
				dto.maxCollateral === undefined
					? undefined
					: parseAmount(dto.maxCollateral, "maxCollateral"),
		});
		return envelope(escrow);
	}

	@Post(":escrowId/exercise")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@HttpCode(200)
	@ApiOperation({ summary: "Holder exercises an American option early" })
	@ApiParam({ name: "escrowId", description: "Escrow id" })
	@ApiBody({ type: SettleEscrowInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(SettlementOutcomeDto) })
	@ApiForbiddenResponse({ description: "Caller is not the holder" })
	@ApiUnprocessableEntityResponse({
		description: "Not American, expired or out of the money",
	})
	async exercise(
		@CallerFromJwt() caller: string,
		@Param("escrowId") escrowId: string,
		@Body() dto: SettleEscrowInDto,
	): Promise<ApiEnvelope<SettlementOutcomeDto>> {
		const outcome = await this.service.exercise(
			caller,
			escrowId,
			parseAmount(dto.spotPrice, "spotPrice"),
			dto.now ?? this.clock(),
		);
		return envelope(outcome);
	}

	@Post(":escrowId/settle")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@HttpCode(200)
	@ApiOperation({ summary: "Settle at or after expiration" })
	@ApiParam({ name: "escrowId", description: "Escrow id" })
	@ApiBody({ type: SettleEscrowInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(SettlementOutcomeDto) })
	@ApiConflictResponse({ description: "Already settled" })
	@ApiUnprocessableEntityResponse({ description: "Not expired yet" })
	async settle(
		@CallerFromJwt() caller: string,
		@Param("escrowId") escrowId: string,
		@Body() dto: SettleEscrowInDto,
	): Promise<ApiEnvelope<SettlementOutcomeDto>> {
		const outcome = await this.service.settle(
			caller,
			escrowId,
			parseAmount(dto.spotPrice, "spotPrice"),
			dto.now ?? this.clock(),
		);
		return envelope(outcome);
	}

	@Patch(":escrowId/cancel")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@HttpCode(200)
	@ApiOperation({ summary: "Initializer cancels before collateralization" })
	@ApiParam({ name: "escrowId", description: "Escrow id" })
	@ApiBody({ type: CancelEscrowInDto, required: false })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetEscrowDto) })
	@ApiConflictResponse({ description: "Escrow already collateralized" })
	async cancel(
		@CallerFromJwt() caller: string,
		@Param("escrowId") escrowId: string,
		@Body() dto: CancelEscrowInDto,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		const escrow = await this.service.cancel(
			caller,
			escrowId,
			dto.now ?? this.clock(),
		);
		return envelope(escrow);
	}

	@Get(":escrowId/settlement")
	@UseGuards(AuthGuard)
	@ApiBearerAuth()
	@ApiOperation({ summary: "Settlement record of a settled escrow" })
	@ApiParam({ name: "escrowId", description: "Escrow id" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetSettlementDto) })
	@ApiNotFoundResponse({ description: "Escrow missing or not settled" })
	async getSettlement(
		@Param("escrowId") escrowId: string,
	): Promise<ApiEnvelope<GetSettlementDto>> {
		const settlement = await this.service.getSettlement(escrowId);
		if (!settlement) {
			throw new NotFoundException(`Escrow ${escrowId} has not settled`);
		}
		return envelope(settlement);
	}

	@Sse(":escrowId/sse")
	@ApiOperation({ summary: "Subscribe to status changes of one escrow" })
	sse(@Param("escrowId") escrowId: string): Observable<SseEvent> {
		return this.sseService.escrowEvents(escrowId).pipe(
			map((event) => ({
				data: event,
			})),
		);
	}
}

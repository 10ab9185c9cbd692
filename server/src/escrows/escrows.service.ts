import { Inject, Injectable, Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { Brackets } from "typeorm";
import { nanoid } from "nanoid";
import {
	type DepositCollateralParams,
	type EscrowRecord,
	EscrowRegistry,
	type EscrowStatus,
	type Identity,
	type InitializeEscrowParams,
	KeyedMutex,
	type SettlementOutcome,
	type SettlementRecord,
	type UnixTimestamp,
} from "@options-escrow/sdk";
import { TypeOrmUnitOfWork } from "../persistence/typeorm-unit-of-work";
import { LOCKS } from "../persistence/persistence.constants";
import {
	type Cursor,
	cursorToString,
	emptyCursor,
} from "../common/dto/envelopes";
import {
	ESCROW_CANCELLED_ID,
	ESCROW_COLLATERALIZED_ID,
	ESCROW_INITIALIZED_ID,
	ESCROW_SETTLED_ID,
	type EscrowCancelled,
	type EscrowCollateralized,
	type EscrowInitialized,
	type EscrowSettled,
} from "../common/escrow.event";
import { OptionEscrow } from "./option-escrow.entity";
import { toEscrowRecord } from "./escrow-mapper";
import type { GetEscrowDto } from "./dto/get-escrow.dto";
import type {
	GetSettlementDto,
	SettlementOutcomeDto,
} from "./dto/get-settlement.dto";

export type EscrowQueryFilter = {
	status?: EscrowStatus;
	role?: "initializer" | "counterparty";
};

@Injectable()
export class EscrowsService {
	private readonly logger = new Logger(EscrowsService.name);
	private readonly registry: EscrowRegistry;

	constructor(
		private readonly unitOfWork: TypeOrmUnitOfWork,
		@Inject(LOCKS) locks: KeyedMutex,
		private readonly events: EventEmitter2,
	) {
		this.registry = new EscrowRegistry({ unitOfWork, locks });
	}

	async initialize(
		caller: Identity,
		params: InitializeEscrowParams,
		now: UnixTimestamp,
	): Promise<GetEscrowDto> {
		const escrow = await this.registry.initializeEscrow(caller, params, now);
		this.logger.log(
			`Escrow ${escrow.id} initialized by ${caller} (${escrow.optionType}/${escrow.style})`,
		);
		this.events.emit(ESCROW_INITIALIZED_ID, {
			eventId: nanoid(),
			escrowId: escrow.id,
			initializer: escrow.initializer,
			counterparty: escrow.counterparty,
			createdAt: escrow.createdAt,
		} satisfies EscrowInitialized);
		return this.toDto(escrow);
	}

	async deposit(
		caller: Identity,
		escrowId: string,
		params: DepositCollateralParams,
	): Promise<GetEscrowDto> {
		const escrow = await this.registry.depositCollateral(
			caller,
			escrowId,
			params,
		);
		this.logger.log(
			`Escrow ${escrow.id} collateralized with ${escrow.collateralAmount} ${escrow.collateralAsset}`,
		);
		this.events.emit(ESCROW_COLLATERALIZED_ID, {
			eventId: nanoid(),
			escrowId: escrow.id,
			asset: escrow.collateralAsset,
			amount: escrow.collateralAmount.toString(),
			lockReceipt: escrow.lockReceipt,
		} satisfies EscrowCollateralized);
		return this.toDto(escrow);
	}

	async exercise(
		caller: Identity,
		escrowId: string,
		spotPrice: bigint,
		now: UnixTimestamp,
	): Promise<SettlementOutcomeDto> {
		const outcome = await this.registry.exerciseEarly(
			caller,
			escrowId,
			spotPrice,
			now,
		);
		return this.settled(outcome);
	}

	async settle(
		caller: Identity,
		escrowId: string,
		spotPrice: bigint,
		now: UnixTimestamp,
	): Promise<SettlementOutcomeDto> {
		const outcome = await this.registry.settleEscrow(
			caller,
			escrowId,
			spotPrice,
			now,
		);
		return this.settled(outcome);
	}

	async cancel(
		caller: Identity,
		escrowId: string,
		now: UnixTimestamp,
	): Promise<GetEscrowDto> {
		const escrow = await this.registry.cancelEscrow(caller, escrowId, now);
		this.logger.log(`Escrow ${escrow.id} cancelled by ${caller}`);
		this.events.emit(ESCROW_CANCELLED_ID, {
			eventId: nanoid(),
			escrowId: escrow.id,
			cancelledAt: now,
		} satisfies EscrowCancelled);
		return this.toDto(escrow);
	}

	async getOne(escrowId: string): Promise<GetEscrowDto> {
		return this.toDto(await this.registry.getEscrow(escrowId));
	}

	async getSettlement(escrowId: string): Promise<GetSettlementDto | null> {
		const settlement = await this.registry.getSettlement(escrowId);
		return settlement ? this.toSettlementDto(settlement) : null;
	}

	async getByCaller(
		caller: Identity,
		filter: EscrowQueryFilter,
		limit: number,
		cursor: Cursor = emptyCursor,
	): Promise<{
		items: GetEscrowDto[];
		nextCursor?: string;
		total: number;
	}> {
		const take = Math.min(Math.max(limit, 1), 100);

		const roleBrackets = new Brackets((w) => {
			if (filter.role === "initializer") {
				w.where("e.initializer = :caller", { caller });
			} else if (filter.role === "counterparty") {
				w.where("e.counterparty = :caller", { caller });
			} else {
				w.where("e.initializer = :caller", { caller }).orWhere(
					"e.counterparty = :caller",
					{ caller },
				);
			}
		});

		// Queued behind in-flight writes on the shared SQLite connection.
		const { rows, total } = await this.unitOfWork.transaction(
			async (manager) => {
				const qb = manager
					.createQueryBuilder(OptionEscrow, "e")
					.where(roleBrackets);
				if (filter.status) {
					qb.andWhere("e.status = :status", { status: filter.status });
				}
				const total = await qb.getCount();

				if (cursor.createdBefore !== undefined && cursor.idBefore !== undefined) {
					qb.andWhere(
						new Brackets((w) => {
							w.where("e.createdAt < :createdBefore", {
								createdBefore: cursor.createdBefore,
							}).orWhere(
								new Brackets((w2) => {
									w2.where("e.createdAt = :createdAtEq", {
										createdAtEq: cursor.createdBefore,
									}).andWhere("e.id < :idBefore", { idBefore: cursor.idBefore });
								}),
							);
						}),
					);
				}

				const rows = await qb
					.orderBy("e.createdAt", "DESC")
					.addOrderBy("e.id", "DESC")
					.take(take)
					.getMany();
				return { rows, total };
			},
		);

		let nextCursor: string | undefined;
		const last = rows.at(-1);
		if (last && rows.length === take) {
			nextCursor = cursorToString(last.createdAt, last.id);
		}

		return {
			items: rows.map((row) => this.toDto(toEscrowRecord(row))),
			nextCursor,
			total,
		};
	}

	private settled(outcome: SettlementOutcome): SettlementOutcomeDto {
		const { escrow, settlement } = outcome;
		this.logger.log(
			`Escrow ${escrow.id} settled (${settlement.kind}, ${settlement.moneyness}): payoff ${settlement.payoff}, fee ${settlement.fee}`,
		);
		this.events.emit(ESCROW_SETTLED_ID, {
			eventId: nanoid(),
			escrowId: escrow.id,
			kind: settlement.kind,
			moneyness: settlement.moneyness,
			holder: settlement.holder,
			payoff: settlement.payoff.toString(),
			fee: settlement.fee.toString(),
			settledAt: settlement.settledAt,
		} satisfies EscrowSettled);
		return {
			escrow: this.toDto(escrow),
			settlement: this.toSettlementDto(settlement),
			disbursements: outcome.disbursements.map((d) => ({
				kind: d.kind,
				recipient: d.recipient,
				amount: d.amount.toString(),
			})),
		};
	}

	private toDto(escrow: EscrowRecord): GetEscrowDto {
		return {
			id: escrow.id,
			initializer: escrow.initializer,
			counterparty: escrow.counterparty,
			optionType: escrow.optionType,
			style: escrow.style,
			strikePrice: escrow.strikePrice.toString(),
			notional: escrow.notional.toString(),
			expirationTime: escrow.expirationTime,
			collateralAsset: escrow.collateralAsset,
			collateralAmount: escrow.collateralAmount.toString(),
			status: escrow.status,
			allowedActions: this.registry.allowedActions(escrow),
			createdAt: escrow.createdAt,
			version: escrow.version,
			lockReceipt: escrow.lockReceipt,
			settledAt: escrow.settledAt,
			cancelledAt: escrow.cancelledAt,
		};
	}

	private toSettlementDto(settlement: SettlementRecord): GetSettlementDto {
		return {
			escrowId: settlement.escrowId,
			kind: settlement.kind,
			spotPrice: settlement.spotPrice.toString(),
			moneyness: settlement.moneyness,
			rawPayoff: settlement.rawPayoff.toString(),
			payoff: settlement.payoff.toString(),
			holder: settlement.holder,
			holderAmount: settlement.holderAmount.toString(),
			initializerAmount: settlement.initializerAmount.toString(),
			fee: settlement.fee.toString(),
			feeCollector: settlement.feeCollector,
			feeRateBps: settlement.feeRateBps,
			feePolicy: settlement.feePolicy,
			governanceVersion: settlement.governanceVersion,
			settledAt: settlement.settledAt,
		};
	}
}

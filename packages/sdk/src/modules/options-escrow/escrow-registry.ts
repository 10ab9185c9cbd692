/**
 * Escrow Registry
 *
 * Orchestrates the options escrow lifecycle: validates every request
 * against the state machine, the caller's role and the clock, then applies
 * the state change and every vault movement in one unit of work.
 *
 * Operations on the same escrow are serialized by a keyed mutex and every
 * write is a compare-and-set on the record version. The registry never
 * reads a clock: `now` is always supplied by the caller.
 */

import { nanoid } from "nanoid";
import { KeyedMutex, escrowLockKey } from "../../concurrency/keyed-mutex.js";
import { assertTimestamp, assertU64 } from "../../core/checked-math.js";
import { OptionsEscrowError, toVaultError } from "../../core/errors.js";
import type { Identity, UnixTimestamp } from "../../core/types.js";
import { assertGovernanceFresh } from "../../governance/governance-rules.js";
import type { GovernanceConfig } from "../../governance/types.js";
import {
	isInTheMoney,
	requiredCollateral,
} from "../../settlement/settlement-engine.js";
import { EXERCISE_STYLES, OPTION_TYPES } from "../../settlement/types.js";
import type { TransactionScope, UnitOfWork } from "../../storage/types.js";
import type { VaultReceipt } from "../../vault/types.js";
import {
	escrowStateMachine,
	isFinalStatus,
} from "./escrow-state-machine.js";
import { planSettlement } from "./settlement-plan.js";
import type {
	DepositCollateralParams,
	EscrowAction,
	EscrowRecord,
	InitializeEscrowParams,
	SettlementKind,
	SettlementOutcome,
	SettlementRecord,
} from "./types.js";

export interface EscrowRegistryOptions {
	unitOfWork: UnitOfWork;
	/** Share one mutex between registries that use the same storage. */
	locks?: KeyedMutex;
	generateId?: () => string;
}

function invalid(message: string, details?: unknown): OptionsEscrowError {
	return new OptionsEscrowError("InvalidParameters", message, details);
}

export class EscrowRegistry {
	private readonly unitOfWork: UnitOfWork;
	private readonly locks: KeyedMutex;
	private readonly generateId: () => string;

	constructor(options: EscrowRegistryOptions) {
		this.unitOfWork = options.unitOfWork;
		this.locks = options.locks ?? new KeyedMutex();
		this.generateId = options.generateId ?? (() => nanoid(16));
	}

	async initializeEscrow(
		caller: Identity,
		params: InitializeEscrowParams,
		now: UnixTimestamp,
	): Promise<EscrowRecord> {
		assertTimestamp(now, "now");
		assertTimestamp(params.expirationTime, "expirationTime");
		if (!OPTION_TYPES.includes(params.optionType)) {
			throw invalid(`Unknown option type "${params.optionType}"`);
		}
		if (!EXERCISE_STYLES.includes(params.style)) {
			throw invalid(`Unknown exercise style "${params.style}"`);
		}
		if (assertU64(params.strikePrice, "strikePrice") === 0n) {
			throw invalid("strikePrice must be greater than zero");
		}
		if (assertU64(params.notional, "notional") === 0n) {
			throw invalid("notional must be greater than zero");
		}
		if (params.expirationTime <= now) {
			throw invalid("expirationTime must be in the future", {
				expirationTime: params.expirationTime,
				now,
			});
		}
		if (params.collateralAsset.trim().length === 0) {
			throw invalid("collateralAsset must not be empty");
		}
		if (params.counterparty === caller) {
			throw invalid("counterparty must differ from the initializer");
		}

		const record: EscrowRecord = {
			id: this.generateId(),
			initializer: caller,
			counterparty: params.counterparty ?? null,
			optionType: params.optionType,
			style: params.style,
			strikePrice: params.strikePrice,
			notional: params.notional,
			expirationTime: params.expirationTime,
			collateralAsset: params.collateralAsset,
			collateralAmount: 0n,
			status: "created",
			createdAt: now,
			version: 1,
			lockReceipt: null,
			settledAt: null,
			cancelledAt: null,
		};
		await this.unitOfWork.run((scope) => scope.escrows.insert(record));
		return record;
	}

	depositCollateral(
		caller: Identity,
		escrowId: string,
		params: DepositCollateralParams,
	): Promise<EscrowRecord> {
		return this.exclusive(escrowId, async (scope) => {
			const escrow = await this.load(scope, escrowId);
			if (escrow.initializer !== caller) {
				throw new OptionsEscrowError(
					"Unauthorized",
					"Only the initializer can deposit collateral",
				);
			}
			const status = escrowStateMachine(escrow.status).perform("deposit");
			if (params.asset !== escrow.collateralAsset) {
				throw new OptionsEscrowError(
					"IncorrectCollateralAsset",
					`Escrow expects collateral in ${escrow.collateralAsset}`,
					{ expected: escrow.collateralAsset, received: params.asset },
				);
			}
			const amount = assertU64(params.amount, "amount");
			const required = requiredCollateral(
				escrow.optionType,
				escrow.strikePrice,
				escrow.notional,
				params.maxCollateral === undefined
					? undefined
					: assertU64(params.maxCollateral, "maxCollateral"),
			);
			if (amount === 0n || amount < required) {
				throw new OptionsEscrowError(
					"InsufficientCollateral",
					"Deposit does not cover the required collateral",
					{ required: required.toString(), received: amount.toString() },
				);
			}

			const receipt = await this.vaultCall(() =>
				scope.vault.lock({
					escrowId,
					owner: caller,
					asset: escrow.collateralAsset,
					amount,
					idempotencyKey: `${escrowId}:lock`,
				}),
			);
			return this.commit(scope, escrow, {
				status,
				collateralAmount: amount,
				lockReceipt: receipt.receiptId,
			});
		});
	}

	/**
	 * Pays out an in-the-money American option before expiration.
	 */
	exerciseEarly(
		caller: Identity,
		escrowId: string,
		spotPrice: bigint,
		now: UnixTimestamp,
	): Promise<SettlementOutcome> {
		return this.settleWith("exercise", caller, escrowId, spotPrice, now);
	}

	/**
	 * Settles at or after expiration against `spotPrice`.
	 */
	settleEscrow(
		caller: Identity,
		escrowId: string,
		spotPrice: bigint,
		now: UnixTimestamp,
	): Promise<SettlementOutcome> {
		return this.settleWith("expiry", caller, escrowId, spotPrice, now);
	}

	cancelEscrow(
		caller: Identity,
		escrowId: string,
		now: UnixTimestamp,
	): Promise<EscrowRecord> {
		assertTimestamp(now, "now");
		return this.exclusive(escrowId, async (scope) => {
			const escrow = await this.load(scope, escrowId);
			this.assertNotFinal(escrow);
			if (escrow.initializer !== caller) {
				throw new OptionsEscrowError(
					"Unauthorized",
					"Only the initializer can cancel the escrow",
				);
			}
			const status = escrowStateMachine(escrow.status).perform("cancel");
			return this.commit(scope, escrow, { status, cancelledAt: now });
		});
	}

	getEscrow(escrowId: string): Promise<EscrowRecord> {
		return this.unitOfWork.run((scope) => this.load(scope, escrowId));
	}

	/**
	 * @returns null while the escrow has not settled
	 */
	getSettlement(escrowId: string): Promise<SettlementRecord | null> {
		return this.unitOfWork.run(async (scope) => {
			await this.load(scope, escrowId);
			return scope.escrows.loadSettlement(escrowId);
		});
	}

	allowedActions(escrow: EscrowRecord): EscrowAction[] {
		return escrowStateMachine(escrow.status).getAllowedActions();
	}

	private async settleWith(
		kind: SettlementKind,
		caller: Identity,
		escrowId: string,
		spotPrice: bigint,
		now: UnixTimestamp,
	): Promise<SettlementOutcome> {
		assertU64(spotPrice, "spotPrice");
		assertTimestamp(now, "now");
		const snapshot = await this.readGovernance();

		return this.exclusive(escrowId, async (scope) => {
			const escrow = await this.load(scope, escrowId);
			this.assertNotFinal(escrow);
			const holder = this.resolveHolder(escrow, caller, kind);
			const machine = escrowStateMachine(escrow.status);

			if (kind === "exercise") {
				if (escrow.style !== "american") {
					throw new OptionsEscrowError(
						"NotAmerican",
						"Only American options can be exercised early",
					);
				}
				machine.perform("exercise");
				if (now >= escrow.expirationTime) {
					throw new OptionsEscrowError("Expired", "Option has expired", {
						expirationTime: escrow.expirationTime,
						now,
					});
				}
				if (!isInTheMoney(escrow.optionType, escrow.strikePrice, spotPrice)) {
					throw new OptionsEscrowError(
						"NotITM",
						"Option is not in the money",
						{ strikePrice: escrow.strikePrice.toString(), spotPrice: spotPrice.toString() },
					);
				}
			} else {
				machine.assertAllowed("settle");
				if (now < escrow.expirationTime) {
					throw new OptionsEscrowError("NotExpired", "Option has not expired", {
						expirationTime: escrow.expirationTime,
						now,
					});
				}
			}

			const governance = assertGovernanceFresh(
				snapshot,
				await scope.governance.load(),
			);
			const plan = planSettlement(escrow, spotPrice, holder, governance);
			const counterparty =
				escrow.counterparty ?? (holder === escrow.initializer ? null : holder);

			let current = escrow;
			if (machine.getState() === "exercised") {
				current = await this.commit(scope, current, {
					status: machine.getState(),
					counterparty,
				});
			}
			for (const disbursement of plan.disbursements) {
				await this.vaultCall(() =>
					scope.vault.release({
						escrowId,
						recipient: disbursement.recipient,
						asset: escrow.collateralAsset,
						amount: disbursement.amount,
						idempotencyKey: `${escrowId}:${disbursement.kind}`,
					}),
				);
			}
			const settled = await this.commit(scope, current, {
				status: machine.perform("settle"),
				counterparty,
				collateralAmount: 0n,
				settledAt: now,
			});

			const settlement: SettlementRecord = {
				escrowId,
				kind,
				spotPrice,
				moneyness: plan.moneyness,
				rawPayoff: plan.rawPayoff,
				payoff: plan.payoff,
				holder,
				holderAmount: plan.holderAmount,
				initializerAmount: plan.initializerAmount,
				fee: plan.fee,
				feeCollector: governance.feeCollector,
				feeRateBps: governance.feeRateBps,
				feePolicy: governance.feePolicy,
				governanceVersion: governance.version,
				settledAt: now,
			};
			await scope.escrows.saveSettlement(settlement);
			return { escrow: settled, settlement, disbursements: plan.disbursements };
		});
	}

	/**
	 * Who receives the payout leg.
	 *
	 * A recorded counterparty is the only holder. Without one, the first
	 * caller other than the initializer claims the position; an initializer
	 * settling an unclaimed escrow is paid the payout leg as well.
	 */
	private resolveHolder(
		escrow: EscrowRecord,
		caller: Identity,
		kind: SettlementKind,
	): Identity {
		if (kind === "expiry" && caller === escrow.initializer) {
			return escrow.counterparty ?? escrow.initializer;
		}
		const permitted = escrow.counterparty
			? caller === escrow.counterparty
			: caller !== escrow.initializer;
		if (!permitted) {
			throw new OptionsEscrowError(
				"Unauthorized",
				kind === "exercise"
					? "Only the option holder can exercise"
					: "Caller is not a party to this escrow",
			);
		}
		return caller;
	}

	private assertNotFinal(escrow: EscrowRecord): void {
		if (isFinalStatus(escrow.status)) {
			throw new OptionsEscrowError(
				"AlreadySettled",
				`Escrow is already ${escrow.status}`,
				{ status: escrow.status },
			);
		}
	}

	private async readGovernance(): Promise<GovernanceConfig> {
		const governance = await this.unitOfWork.run((scope) =>
			scope.governance.load(),
		);
		if (!governance) {
			throw new OptionsEscrowError(
				"GovernanceNotInitialized",
				"Governance has not been initialized",
			);
		}
		return governance;
	}

	private async load(
		scope: TransactionScope,
		escrowId: string,
	): Promise<EscrowRecord> {
		const escrow = await scope.escrows.load(escrowId);
		if (!escrow) {
			throw new OptionsEscrowError(
				"EscrowNotFound",
				`Escrow ${escrowId} not found`,
			);
		}
		return escrow;
	}

	private async commit(
		scope: TransactionScope,
		escrow: EscrowRecord,
		changes: Partial<Omit<EscrowRecord, "id" | "version">>,
	): Promise<EscrowRecord> {
		const next: EscrowRecord = {
			...escrow,
			...changes,
			version: escrow.version + 1,
		};
		if (!(await scope.escrows.compareAndSet(escrow.version, next))) {
			throw new OptionsEscrowError(
				"InvalidState",
				`Escrow ${escrow.id} was modified concurrently`,
			);
		}
		return next;
	}

	private async vaultCall(
		call: () => Promise<VaultReceipt>,
	): Promise<VaultReceipt> {
		try {
			return await call();
		} catch (error) {
			throw toVaultError(error);
		}
	}

	private exclusive<T>(
		escrowId: string,
		work: (scope: TransactionScope) => Promise<T>,
	): Promise<T> {
		return this.locks.runExclusive(escrowLockKey(escrowId), () =>
			this.unitOfWork.run(work),
		);
	}
}

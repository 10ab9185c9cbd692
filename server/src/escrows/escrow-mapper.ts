import type { EscrowRecord, SettlementRecord } from "@options-escrow/sdk";
import type { OptionEscrow } from "./option-escrow.entity";
import type { EscrowSettlement } from "./escrow-settlement.entity";

export function toEscrowRecord(row: OptionEscrow): EscrowRecord {
	return {
		id: row.externalId,
		initializer: row.initializer,
		counterparty: row.counterparty,
		optionType: row.optionType,
		style: row.style,
		strikePrice: row.strikePrice,
		notional: row.notional,
		expirationTime: row.expirationTime,
		collateralAsset: row.collateralAsset,
		collateralAmount: row.collateralAmount,
		status: row.status,
		createdAt: row.createdAt,
		version: row.version,
		lockReceipt: row.lockReceipt,
		settledAt: row.settledAt,
		cancelledAt: row.cancelledAt,
	};
}

/** Columns written on insert and compare-and-set. */
export function toEscrowColumns(record: EscrowRecord) {
	return {
		externalId: record.id,
		initializer: record.initializer,
		counterparty: record.counterparty,
		optionType: record.optionType,
		style: record.style,
		strikePrice: record.strikePrice,
		notional: record.notional,
		expirationTime: record.expirationTime,
		collateralAsset: record.collateralAsset,
		collateralAmount: record.collateralAmount,
		status: record.status,
		createdAt: record.createdAt,
		version: record.version,
		lockReceipt: record.lockReceipt,
		settledAt: record.settledAt,
		cancelledAt: record.cancelledAt,
	};
}

export function toSettlementRecord(row: EscrowSettlement): SettlementRecord {
	return {
		escrowId: row.escrowId,
		kind: row.kind,
		spotPrice: row.spotPrice,
		moneyness: row.moneyness,
		rawPayoff: row.rawPayoff,
		payoff: row.payoff,
		holder: row.holder,
		holderAmount: row.holderAmount,
		initializerAmount: row.initializerAmount,
		fee: row.fee,
		feeCollector: row.feeCollector,
		feeRateBps: row.feeRateBps,
		feePolicy: row.feePolicy,
		governanceVersion: row.governanceVersion,
		settledAt: row.settledAt,
	};
}

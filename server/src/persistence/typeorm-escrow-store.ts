import type { EntityManager } from "typeorm";
import {
	type EscrowRecord,
	type EscrowStore,
	type SettlementRecord,
	StorageError,
} from "@options-escrow/sdk";
import { OptionEscrow } from "../escrows/option-escrow.entity";
import { EscrowSettlement } from "../escrows/escrow-settlement.entity";
import {
	toEscrowColumns,
	toEscrowRecord,
	toSettlementRecord,
} from "../escrows/escrow-mapper";

export class TypeOrmEscrowStore implements EscrowStore {
	constructor(private readonly manager: EntityManager) {}

	async load(id: string): Promise<EscrowRecord | null> {
		const row = await this.manager.findOne(OptionEscrow, {
			where: { externalId: id },
		});
		return row ? toEscrowRecord(row) : null;
	}

	async insert(record: EscrowRecord): Promise<void> {
		const exists = await this.manager.exists(OptionEscrow, {
			where: { externalId: record.id },
		});
		if (exists) {
			throw new StorageError(
				`Escrow ${record.id} already exists`,
				"DUPLICATE_ID",
			);
		}
		await this.manager.insert(OptionEscrow, toEscrowColumns(record));
	}

	async compareAndSet(
		expectedVersion: number,
		record: EscrowRecord,
	): Promise<boolean> {
		const result = await this.manager.update(
			OptionEscrow,
			{ externalId: record.id, version: expectedVersion },
			toEscrowColumns(record),
		);
		return result.affected === 1;
	}

	async saveSettlement(record: SettlementRecord): Promise<void> {
		await this.manager.insert(EscrowSettlement, { ...record });
	}

	async loadSettlement(escrowId: string): Promise<SettlementRecord | null> {
		const row = await this.manager.findOne(EscrowSettlement, {
			where: { escrowId },
		});
		return row ? toSettlementRecord(row) : null;
	}
}

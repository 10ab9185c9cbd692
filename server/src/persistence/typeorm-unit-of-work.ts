import { Injectable } from "@nestjs/common";
import { DataSource, type EntityManager } from "typeorm";
import {
	KeyedMutex,
	type TransactionScope,
	type UnitOfWork,
} from "@options-escrow/sdk";
import { LedgerVault } from "../vault/ledger-vault";
import { TypeOrmEscrowStore } from "./typeorm-escrow-store";
import { TypeOrmGovernanceStore } from "./typeorm-governance-store";

/**
 * Runs escrow, governance and vault writes in one database transaction.
 *
 * SQLite drivers share a single connection, so transactions are queued
 * instead of interleaved.
 */
@Injectable()
export class TypeOrmUnitOfWork implements UnitOfWork {
	private readonly commits = new KeyedMutex();
	private readonly serialize: boolean;

	constructor(
		private readonly dataSource: DataSource,
		private readonly vault: LedgerVault,
	) {
		const type = dataSource.options.type;
		this.serialize = type === "better-sqlite3" || type === "sqlite";
	}

	transaction<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
		const run = () => this.dataSource.transaction(work);
		return this.serialize ? this.commits.runExclusive("sqlite", run) : run();
	}

	run<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T> {
		return this.transaction((manager) =>
			work({
				escrows: new TypeOrmEscrowStore(manager),
				governance: new TypeOrmGovernanceStore(manager),
				vault: this.vault.withTransaction(manager),
			}),
		);
	}
}

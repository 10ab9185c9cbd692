import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { KeyedMutex } from "@options-escrow/sdk";
import { ENTITIES } from "./entities";
import { LedgerVault } from "../vault/ledger-vault";
import { TypeOrmUnitOfWork } from "./typeorm-unit-of-work";
import { LOCKS } from "./persistence.constants";

@Module({
	imports: [TypeOrmModule.forFeature(ENTITIES)],
	providers: [
		LedgerVault,
		TypeOrmUnitOfWork,
		{
			provide: LOCKS,
			useFactory: () => new KeyedMutex(),
		},
	],
	exports: [TypeOrmModule, LedgerVault, TypeOrmUnitOfWork, LOCKS],
})
export class PersistenceModule {}

import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/auth.module";
import { PersistenceModule } from "../persistence/persistence.module";
import { VaultService } from "./vault.service";
import { VaultController } from "./vault.controller";

@Module({
	imports: [PersistenceModule, AuthModule],
	providers: [VaultService],
	controllers: [VaultController],
	exports: [VaultService],
})
export class VaultModule {}

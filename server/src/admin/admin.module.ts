import { Module } from "@nestjs/common";
import { PersistenceModule } from "../persistence/persistence.module";
import { VaultModule } from "../vault/vault.module";
import { AdminService } from "./admin.service";
import { AdminController } from "./admin.controller";

@Module({
	imports: [PersistenceModule, VaultModule],
	providers: [AdminService],
	controllers: [AdminController],
})
export class AdminModule {}

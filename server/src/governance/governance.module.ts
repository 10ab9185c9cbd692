import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/auth.module";
import { PersistenceModule } from "../persistence/persistence.module";
import { GovernanceService } from "./governance.service";
import { GovernanceController } from "./governance.controller";

@Module({
	imports: [PersistenceModule, AuthModule],
	providers: [GovernanceService],
	controllers: [GovernanceController],
	exports: [GovernanceService],
})
export class GovernanceModule {}

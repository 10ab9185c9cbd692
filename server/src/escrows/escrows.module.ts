import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/auth.module";
import { PersistenceModule } from "../persistence/persistence.module";
import { EscrowsService } from "./escrows.service";
import { EscrowsController } from "./escrows.controller";

@Module({
	imports: [PersistenceModule, AuthModule],
	providers: [EscrowsService],
	controllers: [EscrowsController],
	exports: [EscrowsService],
})
export class EscrowsModule {}

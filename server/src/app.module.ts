import { ConfigModule } from "@nestjs/config";
import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
	ValidationPipe,
} from "@nestjs/common";
import { APP_FILTER, APP_PIPE } from "@nestjs/core";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { AuthModule } from "./auth/auth.module";
import { CommonModule } from "./common/common.module";
import { HealthModule } from "./health/health.module";
import { EscrowsModule } from "./escrows/escrows.module";
import { GovernanceModule } from "./governance/governance.module";
import { VaultModule } from "./vault/vault.module";
import { AdminModule } from "./admin/admin.module";
import { EscrowExceptionFilter } from "./common/filters/escrow-exception.filter";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";
import { BasicAuthMiddleware } from "./common/middlewares/basic-auth.middleware";

const isTest = process.env.NODE_ENV === "test";

@Module({
	imports: [
		EventEmitterModule.forRoot(),
		ConfigModule.forRoot({ isGlobal: true }),
		TypeOrmModule.forRootAsync({
			useFactory: () => ({
				type: "better-sqlite3",
				database: isTest
					? ":memory:"
					: (process.env.SQLITE_DB_PATH ?? "options-escrow.sqlite"),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		CommonModule,
		AuthModule,
		GovernanceModule,
		EscrowsModule,
		VaultModule,
		AdminModule,
		HealthModule,
	],
	providers: [
		{
			provide: APP_PIPE,
			useValue: new ValidationPipe({
				whitelist: true,
				forbidNonWhitelisted: true,
				transform: true,
			}),
		},
		{ provide: APP_FILTER, useClass: EscrowExceptionFilter },
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer
			.apply(BasicAuthMiddleware)
			.forRoutes({ path: "api/admin/*", method: RequestMethod.ALL });

		consumer
			.apply(RequestLoggingMiddleware)
			.exclude({ path: "api/v1/health", method: RequestMethod.ALL })
			.forRoutes({ path: "*", method: RequestMethod.ALL });
	}
}

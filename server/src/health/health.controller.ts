import { Controller, Get } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { ConfigService } from "@nestjs/config";
import { GovernanceService } from "../governance/governance.service";

@ApiTags("Health")
@Controller("api/v1/health")
export class HealthController {
	constructor(
		private readonly configService: ConfigService,
		private readonly governance: GovernanceService,
	) {}

	@Get()
	@ApiOperation({ summary: "Liveness plus governance readiness" })
	@ApiResponse({
		status: 200,
		schema: {
			type: "object",
			properties: {
				status: { type: "string", example: "ok" },
				governance: {
					type: "string",
					enum: ["initialized", "pending"],
					description: "Settlements fail until governance is initialized",
				},
				timestamp: { type: "string", example: "2025-08-26T10:00:00.000Z" },
				uptime: { type: "number", example: 12345 },
				environment: { type: "string", example: "production" },
			},
		},
	})
	async healthCheck() {
		return {
			status: "ok",
			governance: (await this.governance.isInitialized())
				? "initialized"
				: "pending",
			timestamp: new Date().toISOString(),
			uptime: process.uptime(),
			environment: this.configService.get("NODE_ENV", "development"),
		};
	}
}

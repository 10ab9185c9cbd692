import { Injectable } from "@nestjs/common";
import {
	ESCROW_STATUSES,
	holdsCollateral,
	isFinalStatus,
} from "@options-escrow/sdk";
import { OptionEscrow } from "../escrows/option-escrow.entity";
import { TypeOrmUnitOfWork } from "../persistence/typeorm-unit-of-work";
import type { GetAdminStatsDto } from "./get-admin-stats.dto";

@Injectable()
export class AdminService {
	constructor(private readonly unitOfWork: TypeOrmUnitOfWork) {}

	getEscrowStats(): Promise<GetAdminStatsDto["escrows"]> {
		return this.unitOfWork.transaction(async (manager) => {
			const stats = {
				total: 0,
				open: 0,
				holdingCollateral: 0,
				settled: 0,
				cancelled: 0,
			};
			for (const status of ESCROW_STATUSES) {
				const count = await manager.count(OptionEscrow, { where: { status } });
				stats.total += count;
				if (!isFinalStatus(status)) stats.open += count;
				if (holdsCollateral(status)) stats.holdingCollateral += count;
				if (status === "settled") stats.settled = count;
				if (status === "cancelled") stats.cancelled = count;
			}
			return stats;
		});
	}
}

import type { EntityManager } from "typeorm";
import type { GovernanceConfig, GovernanceStore } from "@options-escrow/sdk";
import {
	GOVERNANCE_KEY,
	GovernanceConfigEntity,
} from "../governance/governance-config.entity";

export class TypeOrmGovernanceStore implements GovernanceStore {
	constructor(private readonly manager: EntityManager) {}

	async load(): Promise<GovernanceConfig | null> {
		const row = await this.manager.findOne(GovernanceConfigEntity, {
			where: { key: GOVERNANCE_KEY },
		});
		if (!row) return null;
		return {
			authority: row.authority,
			feeRateBps: row.feeRateBps,
			feeCollector: row.feeCollector,
			feePolicy: row.feePolicy,
			version: row.version,
		};
	}

	async compareAndSet(
		expectedVersion: number | null,
		config: GovernanceConfig,
	): Promise<boolean> {
		const columns = {
			authority: config.authority,
			feeRateBps: config.feeRateBps,
			feeCollector: config.feeCollector,
			feePolicy: config.feePolicy,
			version: config.version,
		};
		if (expectedVersion === null) {
			const exists = await this.manager.exists(GovernanceConfigEntity, {
				where: { key: GOVERNANCE_KEY },
			});
			if (exists) return false;
			await this.manager.insert(GovernanceConfigEntity, {
				key: GOVERNANCE_KEY,
				...columns,
			});
			return true;
		}
		const result = await this.manager.update(
			GovernanceConfigEntity,
			{ key: GOVERNANCE_KEY, version: expectedVersion },
			columns,
		);
		return result.affected === 1;
	}
}

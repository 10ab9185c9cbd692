import {
	Inject,
	Injectable,
	Logger,
	type OnModuleInit,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { nanoid } from "nanoid";
import {
	DEFAULT_FEE_POLICY,
	FEE_POLICIES,
	type FeePolicy,
	type GovernanceConfig,
	type GovernanceInit,
	GovernanceManager,
	type GovernanceUpdate,
	type Identity,
	KeyedMutex,
	isOptionsEscrowError,
} from "@options-escrow/sdk";
import { TypeOrmUnitOfWork } from "../persistence/typeorm-unit-of-work";
import { LOCKS } from "../persistence/persistence.constants";
import {
	GOVERNANCE_UPDATED_ID,
	type GovernanceUpdated,
} from "../common/governance.event";

function isFeePolicy(value: string): value is FeePolicy {
	return FEE_POLICIES.some((policy) => policy === value);
}

@Injectable()
export class GovernanceService implements OnModuleInit {
	private readonly logger = new Logger(GovernanceService.name);
	private readonly manager: GovernanceManager;

	constructor(
		unitOfWork: TypeOrmUnitOfWork,
		@Inject(LOCKS) locks: KeyedMutex,
		private readonly config: ConfigService,
		private readonly events: EventEmitter2,
	) {
		this.manager = new GovernanceManager({ unitOfWork, locks });
	}

	/**
	 * Creates the config from `GOVERNANCE_*` variables on first boot.
	 */
	async onModuleInit() {
		const authority = this.config.get<string>("GOVERNANCE_AUTHORITY");
		if (!authority || (await this.manager.isInitialized())) return;

		const feePolicy =
			this.config.get<string>("GOVERNANCE_FEE_POLICY") ?? DEFAULT_FEE_POLICY;
		if (!isFeePolicy(feePolicy)) {
			throw new Error(`Unknown GOVERNANCE_FEE_POLICY "${feePolicy}"`);
		}
		const config = await this.initialize(authority, {
			feeRateBps: Number(this.config.get<string>("GOVERNANCE_FEE_RATE_BPS") ?? 0),
			feeCollector:
				this.config.get<string>("GOVERNANCE_FEE_COLLECTOR") ?? authority,
			feePolicy,
		});
		this.logger.log(
			`Governance bootstrapped for ${config.authority} at ${config.feeRateBps} bps`,
		);
	}

	async initialize(
		caller: Identity,
		init: GovernanceInit,
	): Promise<GovernanceConfig> {
		return this.published(await this.manager.initialize(caller, init));
	}

	current(): Promise<GovernanceConfig> {
		return this.manager.current();
	}

	isInitialized(): Promise<boolean> {
		return this.manager.isInitialized();
	}

	async updateFeeRate(caller: Identity, feeRateBps: number) {
		return this.published(await this.manager.updateFeeRate(caller, feeRateBps));
	}

	async updateFeeCollector(caller: Identity, feeCollector: Identity) {
		return this.published(
			await this.manager.updateFeeCollector(caller, feeCollector),
		);
	}

	async update(caller: Identity, update: GovernanceUpdate) {
		return this.published(await this.manager.updateGovernance(caller, update));
	}

	async transfer(caller: Identity, newAuthority: Identity) {
		try {
			return this.published(
				await this.manager.transferGovernance(caller, newAuthority),
			);
		} catch (e) {
			if (isOptionsEscrowError(e, "Unauthorized")) {
				this.logger.warn(`Rejected governance transfer attempt by ${caller}`);
			}
			throw e;
		}
	}

	private published(config: GovernanceConfig): GovernanceConfig {
		this.logger.log(
			`Governance v${config.version}: authority=${config.authority} fee=${config.feeRateBps}bps collector=${config.feeCollector} policy=${config.feePolicy}`,
		);
		this.events.emit(GOVERNANCE_UPDATED_ID, {
			eventId: nanoid(),
			...config,
		} satisfies GovernanceUpdated);
		return config;
	}
}

import { Injectable, Logger } from "@nestjs/common";
import type { Amount, AssetId, Identity } from "@options-escrow/sdk";
import { TypeOrmUnitOfWork } from "../persistence/typeorm-unit-of-work";
import { LedgerVault } from "./ledger-vault";
import type { GetBalanceDto } from "./dto/vault.dto";

@Injectable()
export class VaultService {
	private readonly logger = new Logger(VaultService.name);

	constructor(
		private readonly unitOfWork: TypeOrmUnitOfWork,
		private readonly vault: LedgerVault,
	) {}

	async credit(
		holder: Identity,
		asset: AssetId,
		amount: Amount,
	): Promise<GetBalanceDto> {
		const balance = await this.unitOfWork.transaction((manager) =>
			this.vault.withTransaction(manager).credit(holder, asset, amount),
		);
		this.logger.log(`Credited ${amount} ${asset} to ${holder}`);
		return { holder, asset, balance: balance.toString() };
	}

	async balanceOf(holder: Identity, asset: AssetId): Promise<GetBalanceDto> {
		const balance = await this.unitOfWork.transaction((manager) =>
			this.vault.withTransaction(manager).balanceOf(holder, asset),
		);
		return { holder, asset, balance: balance.toString() };
	}
}

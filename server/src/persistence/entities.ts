import { OptionEscrow } from "../escrows/option-escrow.entity";
import { EscrowSettlement } from "../escrows/escrow-settlement.entity";
import { GovernanceConfigEntity } from "../governance/governance-config.entity";
import { EscrowCustody } from "../vault/escrow-custody.entity";
import { VaultAccount } from "../vault/vault-account.entity";
import { VaultTransfer } from "../vault/vault-transfer.entity";

export const ENTITIES = [
	OptionEscrow,
	EscrowSettlement,
	GovernanceConfigEntity,
	VaultAccount,
	EscrowCustody,
	VaultTransfer,
];

import {
	type ArgumentsHost,
	Catch,
	type ExceptionFilter,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import {
	type EscrowErrorCode,
	OptionsEscrowError,
	StorageError,
	VaultError,
	type VaultFailure,
	isRetryable,
} from "@options-escrow/sdk";

const STATUS_BY_CODE: Record<EscrowErrorCode, HttpStatus> = {
	InvalidParameters: HttpStatus.BAD_REQUEST,
	FeeRateOutOfBounds: HttpStatus.BAD_REQUEST,
	IncorrectCollateralAsset: HttpStatus.BAD_REQUEST,
	Unauthorized: HttpStatus.FORBIDDEN,
	EscrowNotFound: HttpStatus.NOT_FOUND,
	InvalidState: HttpStatus.CONFLICT,
	AlreadySettled: HttpStatus.CONFLICT,
	StaleGovernanceConfig: HttpStatus.CONFLICT,
	GovernanceAlreadyInitialized: HttpStatus.CONFLICT,
	NotExpired: HttpStatus.UNPROCESSABLE_ENTITY,
	Expired: HttpStatus.UNPROCESSABLE_ENTITY,
	NotITM: HttpStatus.UNPROCESSABLE_ENTITY,
	NotAmerican: HttpStatus.UNPROCESSABLE_ENTITY,
	InsufficientCollateral: HttpStatus.UNPROCESSABLE_ENTITY,
	ArithmeticOverflow: HttpStatus.UNPROCESSABLE_ENTITY,
	GovernanceNotInitialized: HttpStatus.SERVICE_UNAVAILABLE,
	VaultError: HttpStatus.SERVICE_UNAVAILABLE,
};

const STATUS_BY_VAULT_FAILURE: Record<VaultFailure, HttpStatus> = {
	UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
	INSUFFICIENT_FUNDS: HttpStatus.UNPROCESSABLE_ENTITY,
	IDEMPOTENCY_CONFLICT: HttpStatus.CONFLICT,
};

export type EscrowErrorBody = {
	statusCode: number;
	error: string;
	message: string;
	retryable: boolean;
	details?: unknown;
};

export function statusFor(
	error: OptionsEscrowError | StorageError,
): HttpStatus {
	if (error instanceof StorageError) {
		return error.code === "DUPLICATE_ID"
			? HttpStatus.CONFLICT
			: HttpStatus.SERVICE_UNAVAILABLE;
	}
	return error instanceof VaultError
		? STATUS_BY_VAULT_FAILURE[error.failure]
		: STATUS_BY_CODE[error.code];
}

function toBody(
	exception: OptionsEscrowError | StorageError,
	statusCode: HttpStatus,
): EscrowErrorBody {
	if (exception instanceof StorageError) {
		return {
			statusCode,
			error: "StorageError",
			message: exception.message,
			retryable: statusCode === HttpStatus.SERVICE_UNAVAILABLE,
			details: { reason: exception.code ?? "UNKNOWN" },
		};
	}
	return {
		statusCode,
		error: exception.code,
		message: exception.message,
		retryable: isRetryable(exception),
		details: exception.details,
	};
}

@Catch(OptionsEscrowError, StorageError)
export class EscrowExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(EscrowExceptionFilter.name);

	catch(exception: OptionsEscrowError | StorageError, host: ArgumentsHost) {
		const response = host.switchToHttp().getResponse<Response>();
		const statusCode = statusFor(exception);
		const body = toBody(exception, statusCode);
		if (statusCode >= 500) {
			this.logger.warn(`${body.error}: ${exception.message}`);
		}
		response.status(statusCode).json(body);
	}
}

import {
	type CanActivate,
	type ExecutionContext,
	Injectable,
	Logger,
	UnauthorizedException,
} from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import type { Request } from "express";
import { describeError } from "../common/errors";

export type AuthenticatedRequest = Request & { caller?: string };

/**
 * Accepts `Authorization: Bearer <jwt>` and exposes the token subject as
 * the caller identity.
 */
@Injectable()
export class AuthGuard implements CanActivate {
	private readonly logger = new Logger(AuthGuard.name);

	constructor(private readonly jwt: JwtService) {}

	async canActivate(context: ExecutionContext): Promise<boolean> {
		const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
		const [scheme, token] = (request.header("authorization") ?? "").split(" ");
		if (scheme !== "Bearer" || !token) {
			throw new UnauthorizedException("Missing bearer token");
		}

		let payload: { sub?: unknown };
		try {
			payload = await this.jwt.verifyAsync<{ sub?: unknown }>(token);
		} catch (e) {
			this.logger.debug(`Rejected token: ${describeError(e)}`);
			throw new UnauthorizedException("Invalid token");
		}
		if (typeof payload.sub !== "string" || payload.sub.length === 0) {
			throw new UnauthorizedException("Token has no subject");
		}
		request.caller = payload.sub;
		return true;
	}
}

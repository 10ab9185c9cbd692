import {
	createParamDecorator,
	type ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import type { AuthenticatedRequest } from "./auth.guard";

/** Caller identity set by {@link AuthGuard}. */
export const CallerFromJwt = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): string => {
		const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
		if (!request.caller) {
			throw new UnauthorizedException();
		}
		return request.caller;
	},
);

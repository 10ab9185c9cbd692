import { Injectable, type NestMiddleware } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { NextFunction, Request, Response } from "express";
import { timingSafeEqual } from "node:crypto";

/**
 * Guards admin routes with HTTP Basic credentials from
 * `BACKOFFICE_BASIC_USER` / `BACKOFFICE_BASIC_PASS`. Unset credentials
 * reject every request.
 */
@Injectable()
export class BasicAuthMiddleware implements NestMiddleware {
	constructor(private readonly config: ConfigService) {}

	use(req: Request, res: Response, next: NextFunction) {
		const header = req.header("authorization");
		if (!header || !header.startsWith("Basic ")) {
			res.setHeader("WWW-Authenticate", 'Basic realm="Restricted"');
			return res.status(401).send("Authentication required");
		}

		const decoded = Buffer.from(
			header.slice("Basic ".length).trim(),
			"base64",
		).toString("utf8");
		const sep = decoded.indexOf(":");
		const username = sep >= 0 ? decoded.slice(0, sep) : "";
		const password = sep >= 0 ? decoded.slice(sep + 1) : "";

		const expectedUser = this.config.get<string>("BACKOFFICE_BASIC_USER") ?? "";
		const expectedPass = this.config.get<string>("BACKOFFICE_BASIC_PASS") ?? "";

		const ok =
			expectedUser.length > 0 &&
			expectedPass.length > 0 &&
			safeEqual(username, expectedUser) &&
			safeEqual(password, expectedPass);
		if (!ok) {
			res.setHeader("WWW-Authenticate", 'Basic realm="Restricted"');
			return res.status(401).send("Unauthorized");
		}

		return next();
	}
}

function safeEqual(a: string, b: string): boolean {
	const ab = Buffer.from(a);
	const bb = Buffer.from(b);
	if (ab.length !== bb.length) {
		// burn the same time as a real comparison
		timingSafeEqual(bb, bb);
		return false;
	}
	return timingSafeEqual(ab, bb);
}

import request from "supertest";
import type { INestApplication } from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import { Test } from "@nestjs/testing";
import { AppModule } from "../src/app.module";

export const NOW = 1_700_000_000;
export const EXPIRY = NOW + 86_400;

export async function createTestApp(): Promise<INestApplication> {
	const moduleFixture = await Test.createTestingModule({
		imports: [AppModule],
	}).compile();
	const app = moduleFixture.createNestApplication();
	await app.init();
	return app;
}

export function tokenFor(app: INestApplication, identity: string) {
	return app.get(JwtService).signAsync({ sub: identity });
}

export const adminAuth = `Basic ${Buffer.from("admin:test-password").toString("base64")}`;

export async function fund(
	app: INestApplication,
	holder: string,
	asset: string,
	amount: string,
) {
	await request(app.getHttpServer())
		.post("/api/admin/v1/vault/credit")
		.set("Authorization", adminAuth)
		.send({ holder, asset, amount })
		.expect(201);
}

export async function initializeGovernance(
	app: INestApplication,
	authority: string,
	body: { feeRateBps: number; feeCollector: string; feePolicy?: string },
) {
	const token = await tokenFor(app, authority);
	await request(app.getHttpServer())
		.post("/api/v1/governance")
		.set("Authorization", `Bearer ${token}`)
		.send(body)
		.expect(201);
}

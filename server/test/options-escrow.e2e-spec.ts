import request from "supertest";
import type { INestApplication } from "@nestjs/common";
import {
	EXPIRY,
	NOW,
	createTestApp,
	fund,
	initializeGovernance,
	tokenFor,
} from "./utils";

describe("Option escrow lifecycle (e2e)", () => {
	let app: INestApplication;
	let writer: string;
	let holder: string;
	let stranger: string;

	beforeAll(async () => {
		app = await createTestApp();
		await initializeGovernance(app, "dao", {
			feeRateBps: 100,
			feeCollector: "treasury",
		});
		await fund(app, "writer", "USDC", "10000");
		writer = await tokenFor(app, "writer");
		holder = await tokenFor(app, "holder");
		stranger = await tokenFor(app, "stranger");
	});

	afterAll(async () => {
		await app.close();
	});

	const http = () => request(app.getHttpServer());

	async function createEscrow(body: Record<string, unknown>) {
		const res = await http()
			.post("/api/v1/escrows")
			.set("Authorization", `Bearer ${writer}`)
			.send({
				strikePrice: "100",
				notional: "10",
				expirationTime: EXPIRY,
				collateralAsset: "USDC",
				now: NOW,
				...body,
			})
			.expect(201);
		const id: string = res.body.data.id;
		return id;
	}

	it("rejects calls without a token", async () => {
		await http().get("/api/v1/escrows").expect(401);
	});

	it("settles an exercised American call", async () => {
		const id = await createEscrow({
			optionType: "call",
			style: "american",
			counterparty: "holder",
		});

		const deposit = await http()
			.patch(`/api/v1/escrows/${id}/deposit`)
			.set("Authorization", `Bearer ${writer}`)
			.send({ amount: "1000", asset: "USDC", maxCollateral: "1000" })
			.expect(200);
		expect(deposit.body.data).toMatchObject({
			status: "collateralized",
			collateralAmount: "1000",
			allowedActions: ["exercise", "settle"],
		});

		const exercised = await http()
			.post(`/api/v1/escrows/${id}/exercise`)
			.set("Authorization", `Bearer ${holder}`)
			.send({ spotPrice: "150", now: NOW + 60 })
			.expect(200);

		expect(exercised.body.data.settlement).toMatchObject({
			kind: "exercise",
			payoff: "500",
			holderAmount: "495",
			initializerAmount: "500",
			fee: "5",
		});
		expect(exercised.body.data.escrow).toMatchObject({
			status: "settled",
			version: 4,
		});

		const balance = await http()
			.get("/api/v1/vault/balances/USDC")
			.set("Authorization", `Bearer ${holder}`)
			.expect(200);
		expect(balance.body.data).toEqual({
			holder: "holder",
			asset: "USDC",
			balance: "495",
		});

		const again = await http()
			.post(`/api/v1/escrows/${id}/settle`)
			.set("Authorization", `Bearer ${holder}`)
			.send({ spotPrice: "150", now: EXPIRY })
			.expect(409);
		expect(again.body).toMatchObject({
			statusCode: 409,
			error: "AlreadySettled",
			retryable: false,
		});

		const settlement = await http()
			.get(`/api/v1/escrows/${id}/settlement`)
			.set("Authorization", `Bearer ${stranger}`)
			.expect(200);
		expect(settlement.body.data.governanceVersion).toBe(1);
	});

	it("maps domain failures to HTTP statuses", async () => {
		const id = await createEscrow({ optionType: "put", style: "european" });

		const early = await http()
			.post(`/api/v1/escrows/${id}/settle`)
			.set("Authorization", `Bearer ${holder}`)
			.send({ spotPrice: "90", now: NOW })
			.expect(409);
		expect(early.body.error).toBe("InvalidState");

		await http()
			.patch(`/api/v1/escrows/${id}/deposit`)
			.set("Authorization", `Bearer ${stranger}`)
			.send({ amount: "1000", asset: "USDC" })
			.expect(403);

		const short = await http()
			.patch(`/api/v1/escrows/${id}/deposit`)
			.set("Authorization", `Bearer ${writer}`)
			.send({ amount: "999", asset: "USDC" })
			.expect(422);
		expect(short.body).toMatchObject({
			error: "InsufficientCollateral",
			details: { required: "1000", received: "999" },
		});

		await http()
			.patch(`/api/v1/escrows/${id}/deposit`)
			.set("Authorization", `Bearer ${writer}`)
			.send({ amount: "1000", asset: "USDC" })
			.expect(200);

		const notExpired = await http()
			.post(`/api/v1/escrows/${id}/settle`)
			.set("Authorization", `Bearer ${holder}`)
			.send({ spotPrice: "90", now: EXPIRY - 1 })
			.expect(422);
		expect(notExpired.body.error).toBe("NotExpired");

		const notAmerican = await http()
			.post(`/api/v1/escrows/${id}/exercise`)
			.set("Authorization", `Bearer ${holder}`)
			.send({ spotPrice: "90", now: NOW + 1 })
			.expect(422);
		expect(notAmerican.body.error).toBe("NotAmerican");

		await http()
			.get("/api/v1/escrows/missing")
			.set("Authorization", `Bearer ${writer}`)
			.expect(404);
	});

	it("validates amounts on the wire", async () => {
		await http()
			.post("/api/v1/escrows")
			.set("Authorization", `Bearer ${writer}`)
			.send({
				optionType: "call",
				style: "american",
				strikePrice: "-5",
				notional: "10",
				expirationTime: EXPIRY,
				collateralAsset: "USDC",
			})
			.expect(400);
	});

	it("cancels before collateralization", async () => {
		const id = await createEscrow({ optionType: "put", style: "american" });

		const cancelled = await http()
			.patch(`/api/v1/escrows/${id}/cancel`)
			.set("Authorization", `Bearer ${writer}`)
			.send({ now: NOW + 10 })
			.expect(200);

		expect(cancelled.body.data).toMatchObject({
			status: "cancelled",
			cancelledAt: NOW + 10,
			allowedActions: [],
		});
	});

	it("lists the writer's escrows", async () => {
		const res = await http()
			.get("/api/v1/escrows?status=cancelled&role=initializer")
			.set("Authorization", `Bearer ${writer}`)
			.expect(200);

		expect(res.body.meta.total).toBe(1);
		expect(res.body.data[0].status).toBe("cancelled");
	});

	it("guards admin routes with basic auth", async () => {
		await http()
			.post("/api/admin/v1/vault/credit")
			.send({ holder: "x", asset: "USDC", amount: "1" })
			.expect(401);
	});
});

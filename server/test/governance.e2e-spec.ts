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

describe("Governance (e2e)", () => {
	let app: INestApplication;
	let dao: string;
	let writer: string;
	let holder: string;

	beforeAll(async () => {
		app = await createTestApp();
		dao = await tokenFor(app, "dao");
		writer = await tokenFor(app, "writer");
		holder = await tokenFor(app, "holder");
	});

	afterAll(async () => {
		await app.close();
	});

	const http = () => request(app.getHttpServer());

	it("reports pending governance before initialization", async () => {
		const health = await http().get("/api/v1/health").expect(200);
		expect(health.body.governance).toBe("pending");

		const res = await http().get("/api/v1/governance").expect(503);
		expect(res.body).toMatchObject({
			error: "GovernanceNotInitialized",
			retryable: false,
		});
	});

	it("initializes once", async () => {
		await initializeGovernance(app, "dao", {
			feeRateBps: 100,
			feeCollector: "treasury",
		});

		const again = await http()
			.post("/api/v1/governance")
			.set("Authorization", `Bearer ${writer}`)
			.send({ feeRateBps: 0, feeCollector: "writer" })
			.expect(409);
		expect(again.body.error).toBe("GovernanceAlreadyInitialized");

		const res = await http().get("/api/v1/governance").expect(200);
		expect(res.body.data).toEqual({
			authority: "dao",
			feeRateBps: 100,
			feeCollector: "treasury",
			feePolicy: "itm-payoff",
			version: 1,
		});
	});

	it("lets only the authority change fees", async () => {
		await http()
			.patch("/api/v1/governance/fee-rate")
			.set("Authorization", `Bearer ${writer}`)
			.send({ feeRateBps: 0 })
			.expect(403);

		const tooHigh = await http()
			.patch("/api/v1/governance/fee-rate")
			.set("Authorization", `Bearer ${dao}`)
			.send({ feeRateBps: 1_001 })
			.expect(400);
		expect(tooHigh.body.error).toBe("FeeRateOutOfBounds");

		const updated = await http()
			.patch("/api/v1/governance")
			.set("Authorization", `Bearer ${dao}`)
			.send({ feeRateBps: 200, feePolicy: "all-disbursements" })
			.expect(200);
		expect(updated.body.data).toMatchObject({
			feeRateBps: 200,
			feePolicy: "all-disbursements",
			version: 2,
		});
	});

	it("charges settlements at the current rate and policy", async () => {
		await fund(app, "writer", "USDC", "1000");
		const created = await http()
			.post("/api/v1/escrows")
			.set("Authorization", `Bearer ${writer}`)
			.send({
				optionType: "put",
				style: "european",
				strikePrice: "100",
				notional: "10",
				expirationTime: EXPIRY,
				collateralAsset: "USDC",
				counterparty: "holder",
				now: NOW,
			})
			.expect(201);
		const id: string = created.body.data.id;
		await http()
			.patch(`/api/v1/escrows/${id}/deposit`)
			.set("Authorization", `Bearer ${writer}`)
			.send({ amount: "1000", asset: "USDC" })
			.expect(200);

		const settled = await http()
			.post(`/api/v1/escrows/${id}/settle`)
			.set("Authorization", `Bearer ${holder}`)
			.send({ spotPrice: "80", now: EXPIRY })
			.expect(200);

		expect(settled.body.data.disbursements).toEqual([
			{ kind: "payout", recipient: "holder", amount: "196" },
			{ kind: "residual", recipient: "writer", amount: "784" },
			{ kind: "fee", recipient: "treasury", amount: "20" },
		]);
		expect(settled.body.data.settlement.governanceVersion).toBe(2);
	});

	it("transfers authority", async () => {
		const res = await http()
			.post("/api/v1/governance/transfer")
			.set("Authorization", `Bearer ${dao}`)
			.send({ newAuthority: "council" })
			.expect(200);
		expect(res.body.data).toMatchObject({ authority: "council", version: 3 });

		await http()
			.patch("/api/v1/governance/fee-collector")
			.set("Authorization", `Bearer ${dao}`)
			.send({ feeCollector: "dao" })
			.expect(403);

		const health = await http().get("/api/v1/health").expect(200);
		expect(health.body.governance).toBe("initialized");
	});
});

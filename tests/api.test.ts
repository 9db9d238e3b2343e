import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { Server } from "http";
import { createApp } from "../src/app";
import { FEE_RECIPIENT, FUNDER_A, FUNDER_B, OWNER, RESEARCHER, VERIFIER, createTestLedger } from "./helpers";

const API_KEY = "test-key";

describe("HTTP API", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const { ledger } = await createTestLedger();
    const app = createApp({ ledger, apiKey: API_KEY });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Expected the test server to listen on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  const call = async (method: string, path: string, principal?: string, body?: unknown) => {
    const headers: Record<string, string> = { "x-api-key": API_KEY, "content-type": "application/json" };
    if (principal !== undefined) {
      headers["x-principal"] = principal;
    }
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  };

  it("serves the status probe without an API key", async () => {
    const res = await fetch(`${baseUrl}/api/status`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ isLive: true });
  });

  it("refuses requests without the API key", async () => {
    const res = await fetch(`${baseUrl}/api/platform`);

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: "Unauthorized", message: "Invalid or missing API key" });
  });

  it("walks a project from registration to payout", async () => {
    const registered = await call("POST", "/api/researchers", RESEARCHER, {
      name: "Ada Researcher",
      institution: "Example Institute",
      expertise: ["genomics"],
    });
    expect(registered.status).toBe(200);
    expect(registered.body).toMatchObject({ principal: RESEARCHER, reputation: 100, isVerified: false });

    const created = await call("POST", "/api/projects", RESEARCHER, {
      title: "Soil microbiome survey",
      fundingGoal: 1000,
      durationDays: 30,
    });
    expect(created).toEqual({ status: 201, body: { projectId: 1 } });

    await call("POST", "/api/projects/1/fund", FUNDER_A, { amount: 600 });
    const funded = await call("POST", "/api/projects/1/fund", FUNDER_B, { amount: 500 });
    expect(funded.body).toEqual({
      projectId: 1,
      contributor: FUNDER_B,
      contribution: 500,
      currentFunding: 1100,
      status: "Funded",
    });

    const contributors = await call("GET", "/api/projects/1/contributors");
    expect(contributors.body).toEqual({ projectId: 1, contributors: [FUNDER_A, FUNDER_B] });

    const milestone = await call("POST", "/api/milestones", RESEARCHER, {
      projectId: 1,
      description: "Collect samples",
      fundingAmount: 400,
    });
    expect(milestone).toEqual({ status: 201, body: { milestoneId: 1 } });

    const completed = await call("POST", "/api/milestones/1/complete", RESEARCHER, { evidence: "ipfs://QmEvidence" });
    expect(completed.body).toMatchObject({ id: 1, completed: true, evidence: "ipfs://QmEvidence" });

    const verified = await call("POST", "/api/milestones/1/verify", VERIFIER);
    expect(verified).toEqual({
      status: 200,
      body: {
        milestoneId: 1,
        projectId: 1,
        researcher: RESEARCHER,
        researcherShare: 390,
        feeRecipient: FEE_RECIPIENT,
        fee: 10,
        reputation: 110,
      },
    });

    const again = await call("POST", "/api/milestones/1/verify", VERIFIER);
    expect(again.status).toBe(409);
    expect(again.body).toEqual({ error: "InvalidState", message: "Milestone 1 is already verified" });

    expect((await call("GET", `/api/platform/accounts/${RESEARCHER}`)).body).toEqual({
      principal: RESEARCHER,
      balance: 390,
    });
    expect((await call("GET", "/api/platform")).body).toMatchObject({ poolBalance: 700, totalProjects: 1, totalMilestones: 1 });
    expect((await call("GET", "/api/projects/1")).body).toMatchObject({ status: "InProgress", currentFunding: 1100 });
  });

  it("maps ledger errors onto status codes", async () => {
    expect(await call("PUT", "/api/platform/fee", OWNER, { feeBps: 1001 })).toEqual({
      status: 422,
      body: { error: "LimitExceeded", message: "feeBps 1001 exceeds the 1000 basis point cap" },
    });
    expect((await call("PUT", "/api/platform/fee", VERIFIER, { feeBps: 100 })).status).toBe(403);
    expect((await call("GET", "/api/projects/0")).status).toBe(404);
    expect((await call("GET", "/api/projects/abc")).body).toEqual({
      error: "NotFound",
      message: "Project abc does not exist",
    });
  });

  it("requires a caller on mutating routes", async () => {
    const res = await call("POST", "/api/projects", undefined, { title: "x", fundingGoal: 1, durationDays: 1 });

    expect(res).toEqual({ status: 401, body: { error: "Unauthorized", message: "Missing x-principal header" } });
  });

  it("rejects malformed and mistyped payloads", async () => {
    const malformed = await fetch(`${baseUrl}/api/projects`, {
      method: "POST",
      headers: { "x-api-key": API_KEY, "x-principal": RESEARCHER, "content-type": "application/json" },
      body: "{not json",
    });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toMatchObject({ error: "InvalidInput" });

    const mistyped = await call("POST", "/api/projects", RESEARCHER, { title: "x", fundingGoal: "1000", durationDays: 30 });
    expect(mistyped).toEqual({ status: 400, body: { error: "InvalidInput", message: "fundingGoal must be a number" } });
  });

  it("answers unknown routes with a JSON 404", async () => {
    expect(await call("GET", "/api/nowhere")).toEqual({
      status: 404,
      body: { error: "NotFound", message: "No route for GET /api/nowhere" },
    });
  });
});

/**
 * HTTP API Tests
 *
 * Serves the app on an ephemeral local port backed by a fake gateway.
 */

import type { Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { AnalysisOrchestrator } from "../src/analysis/orchestrator.js";
import { sharpeRatio } from "../src/quant/statistics.js";
import { createApp, listen } from "../src/server.js";
import { fixedClock } from "../src/utils/clock.js";
import type { ReturnSeries } from "../src/types/market.js";
import { FakeGateway, monthlySeries } from "./helpers/fake-gateway.js";

const NASDAQ = monthlySeries([0.02, -0.01, 0.03, 0.01]);

interface Harness {
  server: Server;
  baseUrl: string;
}

function boundPort(server: Server): number {
  const address = server.address();
  return typeof address === "object" && address !== null ? address.port : 0;
}

function buildApp(data: Record<string, ReturnSeries | Error>) {
  const orchestrator = new AnalysisOrchestrator({
    gateway: new FakeGateway(data),
    clock: fixedClock("2024-12-15T00:00:00Z"),
    benchmarks: ["^IXIC", "^GSPC"],
    lookbackDays: 365,
    riskFreeRate: 0.02,
  });
  return createApp({ orchestrator, corsOrigin: "*" });
}

async function serve(data: Record<string, ReturnSeries | Error>): Promise<Harness> {
  const server = await listen(buildApp(data), 0, "127.0.0.1");
  return { server, baseUrl: `http://127.0.0.1:${boundPort(server)}` };
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

function post(baseUrl: string, body: string): Promise<Response> {
  return fetch(`${baseUrl}/api/stock-data`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

describe("POST /api/stock-data", () => {
  let withBenchmark: Harness;
  let withoutBenchmark: Harness;

  beforeAll(async () => {
    withBenchmark = await serve({ "^IXIC": NASDAQ, AAPL: NASDAQ, BROKEN: new Error("boom") });
    withoutBenchmark = await serve({ AAPL: NASDAQ });
  });

  afterAll(async () => {
    await close(withBenchmark.server);
    await close(withoutBenchmark.server);
  });

  it("should return the analysis payload", async () => {
    const res = await post(withBenchmark.baseUrl, JSON.stringify({ tickers: ["AAPL", "BADTICKER"] }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      stockData: [
        {
          ticker: "AAPL",
          correlation: expect.closeTo(1, 10),
          sharpe_ratio: sharpeRatio(NASDAQ, 0.02),
          returns: [0.02, -0.01, 0.03, 0.01],
        },
        { ticker: "BADTICKER", correlation: 0, sharpe_ratio: 0, returns: [] },
      ],
      benchmarkReturns: [0.02, -0.01, 0.03, 0.01],
      benchmarkUsed: "^IXIC",
      highestCorrTicker: "AAPL",
      lowestCorrTicker: "BADTICKER",
    });
  });

  it("should allow any origin on /api", async () => {
    const res = await post(withBenchmark.baseUrl, JSON.stringify({ tickers: ["AAPL"] }));
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });

  it("should answer CORS preflight", async () => {
    const res = await fetch(`${withBenchmark.baseUrl}/api/stock-data`, { method: "OPTIONS" });
    expect(res.status).toBe(204);
    expect(res.headers.get("access-control-allow-methods")).toBe("GET, POST, OPTIONS");
  });

  it("should reject a body without tickers", async () => {
    const res = await post(withBenchmark.baseUrl, JSON.stringify({}));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "tickers: Request body must include a 'tickers' list" });
  });

  it("should reject tickers that are not a list", async () => {
    const res = await post(withBenchmark.baseUrl, JSON.stringify({ tickers: "AAPL" }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "tickers: 'tickers' must be a list of ticker symbols" });
  });

  it("should accept an empty ticker list", async () => {
    const res = await post(withBenchmark.baseUrl, JSON.stringify({ tickers: [] }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      stockData: [],
      benchmarkReturns: [0.02, -0.01, 0.03, 0.01],
      benchmarkUsed: "^IXIC",
      highestCorrTicker: "",
      lowestCorrTicker: "",
    });
  });

  it("should reject a ticker that is not a string", async () => {
    const res = await post(withBenchmark.baseUrl, JSON.stringify({ tickers: ["AAPL", 42] }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "tickers.1: Each ticker must be a string" });
  });

  it("should reject unparseable JSON", async () => {
    const res = await post(withBenchmark.baseUrl, "{ tickers: ");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: expect.stringMatching(/^Malformed JSON body: /) });
  });

  it("should return 400 naming both benchmarks when neither has data", async () => {
    const res = await post(withoutBenchmark.baseUrl, JSON.stringify({ tickers: ["AAPL"] }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Unable to fetch benchmark data. Tried [^IXIC, ^GSPC]. Please try again later.",
    });
  });

  it("should return 500 with the message when analysis fails unexpectedly", async () => {
    const res = await post(withBenchmark.baseUrl, JSON.stringify({ tickers: ["BROKEN"] }));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Error in analysis: boom" });
  });
});

describe("listen", () => {
  it("should reject when the port is already taken", async () => {
    const first = await listen(buildApp({}), 0, "127.0.0.1");
    try {
      await expect(listen(buildApp({}), boundPort(first), "127.0.0.1")).rejects.toMatchObject({
        code: "EADDRINUSE",
      });
    } finally {
      await close(first);
    }
  });
});

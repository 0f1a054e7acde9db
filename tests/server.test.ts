/**
 * Read-only API Tests
 *
 * Runs the express app on an ephemeral loopback port against in-memory
 * tables.
 */

import type { Server } from "http";
import { afterEach, describe, it, expect } from "vitest";
import { createServer } from "../src/server.js";
import { PortfolioRepository, TABLES } from "../src/storage/portfolio-repository.js";
import { InMemoryTableStore } from "../src/storage/table-store.js";
import { position, snapshot } from "./helpers.js";

const CONFIG = { alertThresholdPct: 5, synthetic: { seed: 42 } };
const NOW = new Date(2024, 2, 5, 18, 0);

let server: Server | null = null;

async function start(tables: Record<string, unknown>) {
  const store = new InMemoryTableStore(tables);
  const app = createServer({ repository: new PortfolioRepository(store), config: CONFIG, clock: () => NOW });
  const s = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  server = s;
  const address = s.address();
  if (address === null || typeof address === "string") throw new Error("server has no TCP address");
  const { port } = address;
  return { store, base: `http://127.0.0.1:${port}` };
}

afterEach(async () => {
  const s = server;
  server = null;
  if (s) await new Promise<void>((resolve) => s.close(() => resolve()));
});

const TABLES_WITH_DATA = {
  holdings: [position("A", 100, 10), position("B", 200, 5)],
  positions: [
    { symbol: "A", currentPrice: 120 },
    { symbol: "B", currentPrice: 190 },
  ],
  performance_history: { snapshots: [snapshot("2024-03-04", 5), snapshot("2024-03-05", 7.5)] },
};

describe("read-only API", () => {
  it("should serve the replayed report", async () => {
    const { base } = await start(TABLES_WITH_DATA);
    const res = await fetch(`${base}/api/report`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      summary: { date: "2024-03-05", totalCurrentValue: 2150 },
      history: { isSynthetic: false, snapshots: [{ date: "2024-03-04" }, { date: "2024-03-05" }] },
    });
  });

  it("should serve metrics on the requested basis", async () => {
    const { base } = await start(TABLES_WITH_DATA);
    // 5% → 7.5% P&L is a 50% change
    expect(await (await fetch(`${base}/api/metrics`)).json()).toMatchObject({
      basis: "pl_percentage",
      observations: 1,
      bestDay: 50,
    });
    expect(await (await fetch(`${base}/api/metrics?basis=value`)).json()).toMatchObject({
      basis: "value",
      observations: 1,
    });

    const bad = await fetch(`${base}/api/metrics?basis=sharpe`);
    expect(bad.status).toBe(400);
  });

  it("should serve alerts and status", async () => {
    const { base } = await start(TABLES_WITH_DATA);
    expect(await (await fetch(`${base}/api/alerts`)).json()).toMatchObject({
      thresholdPct: 5,
      alerts: [{ symbol: "A", direction: "profit" }],
    });

    expect(await (await fetch(`${base}/api/status`)).json()).toMatchObject({
      date: "2024-03-05",
      positions: 2,
      snapshots: 2,
      degradation: { isSynthetic: false, priceUnavailable: false },
    });
  });

  it("should serve monthly returns", async () => {
    const { base } = await start(TABLES_WITH_DATA);
    expect(await (await fetch(`${base}/api/monthly`)).json()).toMatchObject([
      { period: "2024-03", label: "Mar 2024", monthlyReturn: 0 },
    ]);
  });

  it("should answer 503 when holdings are missing", async () => {
    const { base } = await start({});
    const res = await fetch(`${base}/api/report`);
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: `Holdings table "holdings" not found`,
      code: "HOLDINGS_LOAD_FAILED",
    });
  });

  it("should never write to the tables", async () => {
    const { base, store } = await start({ holdings: TABLES_WITH_DATA.holdings });
    const res = await fetch(`${base}/api/history`);
    expect(await res.json()).toMatchObject({ isSynthetic: true });
    expect(store.has(TABLES.history)).toBe(false);
    expect(store.has(TABLES.positions)).toBe(false);
  });
});

import type { Server } from "http";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { createApp } from "./app";
import { loadConfig } from "./lib/config";
import { createServices, type Services } from "./lib/services";

describe("HTTP API", () => {
  let services: Services;
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    services = createServices(loadConfig({ LLM_API_KEY: "test-secret", DATABASE_URL: ":memory:", NODE_ENV: "test" }));
    server = createApp(services).listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("Server did not bind a TCP port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    await services.close();
    vi.restoreAllMocks();
  });

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok" });
  });

  it("validates run requests", async () => {
    const res = await post("/api/runs", { jobDescription: "too short" });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: "Validation failed" });
  });

  it("answers 503 when no search provider is configured", async () => {
    const res = await post("/api/runs", {
      jobDescription: "Program Director for behavioral health services",
      targetProfiles: 5,
    });
    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ key: "SEARCH_API_KEY" });
  });

  it("answers 404 for unknown runs", async () => {
    const res = await fetch(`${baseUrl}/api/runs/42`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Run not found" });

    const logs = await fetch(`${baseUrl}/api/runs/42/logs`);
    expect(logs.status).toBe(404);
  });

  it("lists runs", async () => {
    const res = await fetch(`${baseUrl}/api/runs?limit=5`);
    expect(await res.json()).toEqual({ runs: [], limit: 5, offset: 0 });
  });

  it("imports placements", async () => {
    const res = await post("/api/placements", [
      { name: "Pat Lee", company: "Acme Health", jobTitle: "Program Director" },
      { Name: "Sam Roe", Company: "Beta Care", "Job Title": "Case Manager" },
      { name: "" },
    ]);
    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ imported: 2, rejected: 1 });
  });
});

import { describe, expect, it } from "vitest";
import { startApiTestServer } from "./helpers/server";

describe("server endpoints", () => {
  it("reports health with the configured drivers", async () => {
    const server = await startApiTestServer();

    try {
      const response = await fetch(`${server.baseUrl}/health`, { headers: { "x-request-id": "req-123" } });
      expect(response.status).toBe(200);
      expect(response.headers.get("x-request-id")).toBe("req-123");
      expect(await response.json()).toEqual({ status: "ok", evaluator: "vm", registry: "memory" });
    } finally {
      await server.close();
    }
  });

  it("replaces unusable request ids", async () => {
    const server = await startApiTestServer();

    try {
      const response = await fetch(`${server.baseUrl}/health`, { headers: { "x-request-id": "bad id!" } });
      expect(response.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
    } finally {
      await server.close();
    }
  });

  it("rejects malformed authorization headers", async () => {
    const server = await startApiTestServer();

    try {
      const response = await fetch(`${server.baseUrl}/api/settings`, { headers: { authorization: "Token abc" } });
      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({
        error: { code: "UNAUTHORIZED", message: "Malformed authorization header." }
      });
    } finally {
      await server.close();
    }
  });
});

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { bearerAuthHeaders } from "./helpers/auth";
import { startApiTestServer } from "./helpers/server";

type TestServer = Awaited<ReturnType<typeof startApiTestServer>>;

async function putSettings(server: TestServer, body: unknown): Promise<Response> {
  return fetch(`${server.baseUrl}/api/settings`, {
    method: "PUT",
    headers: { "content-type": "application/json", ...bearerAuthHeaders("admin-1") },
    body: JSON.stringify(body)
  });
}

describe("settings routes", () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await startApiTestServer();
  });

  afterEach(async () => {
    await server.close();
  });

  it("returns the defaults", async () => {
    const response = await fetch(`${server.baseUrl}/api/settings`, { headers: bearerAuthHeaders("admin-1") });
    expect(await response.json()).toEqual({
      widget: false,
      excerpt: false,
      comment: false,
      feed: false,
      authorCapability: "content.edit",
      editorCapability: "content.edit"
    });
  });

  it("applies partial updates", async () => {
    const response = await putSettings(server, { widget: true, authorCapability: "snippets.embed" });
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      widget: true,
      excerpt: false,
      comment: false,
      feed: false,
      authorCapability: "snippets.embed",
      editorCapability: "content.edit"
    });
  });

  it("rejects unknown keys and malformed capabilities", async () => {
    const unknown = await putSettings(server, { everywhere: true });
    expect(unknown.status).toBe(400);
    const body = (await unknown.json()) as { error: string };
    expect(body.error).toBe("INVALID_SETTINGS");

    expect((await putSettings(server, { authorCapability: "bad cap!" })).status).toBe(400);
  });

  it("requires the administrative role", async () => {
    const response = await fetch(`${server.baseUrl}/api/settings`);
    expect(response.status).toBe(403);
  });
});

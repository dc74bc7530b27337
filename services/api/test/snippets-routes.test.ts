import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { bearerAuthHeaders } from "./helpers/auth";
import { startApiTestServer } from "./helpers/server";

const GREET_CODE = 'return "Hello, " + (attributes.name || "World");';

type TestServer = Awaited<ReturnType<typeof startApiTestServer>>;

async function send(
  server: TestServer,
  method: string,
  path: string,
  input: { body?: unknown; headers?: Record<string, string> } = {}
): Promise<Response> {
  return fetch(`${server.baseUrl}${path}`, {
    method,
    headers: { "content-type": "application/json", ...input.headers },
    body: input.body === undefined ? undefined : JSON.stringify(input.body)
  });
}

const admin = () => bearerAuthHeaders("admin-1");

describe("snippet routes", () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await startApiTestServer();
  });

  afterEach(async () => {
    await server.close();
  });

  it("creates and then updates a snippet", async () => {
    const created = await send(server, "PUT", "/api/snippets/greet", {
      headers: admin(),
      body: { code: GREET_CODE, description: '<p onclick="x">Hi</p><script>bad()</script>' }
    });
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({
      name: "greet",
      enabled: true,
      buffer: false,
      description: "<p>Hi</p>",
      code: GREET_CODE,
      lastParameters: {}
    });

    const updated = await send(server, "PUT", "/api/snippets/greet", {
      headers: admin(),
      body: { code: GREET_CODE, enabled: false }
    });
    expect(updated.status).toBe(200);

    const fetched = await send(server, "GET", "/api/snippets/greet", { headers: admin() });
    const body = (await fetched.json()) as { enabled: boolean; description: string };
    expect(body.enabled).toBe(false);
    expect(body.description).toBe("");
  });

  it("stores code without its evaluation markers", async () => {
    const response = await send(server, "PUT", "/api/snippets/marked", {
      headers: admin(),
      body: { code: "<?js return 1; ?>" }
    });
    const body = (await response.json()) as { code: string };
    expect(body.code).toBe("return 1;");
  });

  it("refuses dangerous code and stores nothing", async () => {
    const response = await send(server, "PUT", "/api/snippets/bad", {
      headers: admin(),
      body: { code: 'system("ls");' }
    });
    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      error: {
        code: "CODE_REJECTED",
        message: "Blocked function detected: system",
        rejection: { kind: "blocked_function", message: "Blocked function detected: system", functionName: "system" }
      }
    });

    const lookup = await send(server, "GET", "/api/snippets/bad", { headers: admin() });
    expect(lookup.status).toBe(404);
    expect(await lookup.json()).toEqual({ error: { code: "NOT_FOUND", message: "Snippet not found" } });
    expect(await server.runtime.deps.registry.get("bad")).toBeNull();
  });

  it("refuses code that does not parse", async () => {
    const response = await send(server, "PUT", "/api/snippets/broken", {
      headers: admin(),
      body: { code: "return (;" }
    });
    expect(response.status).toBe(422);
    const body = (await response.json()) as { error: { rejection: { kind: string } } };
    expect(body.error.rejection.kind).toBe("syntax_error");
  });

  it("validates the name and body", async () => {
    const badName = await send(server, "PUT", "/api/snippets/9lives", { headers: admin(), body: { code: "return 1;" } });
    expect(badName.status).toBe(400);
    const badNameBody = (await badName.json()) as { error: { code: string } };
    expect(badNameBody.error.code).toBe("VALIDATION_ERROR");

    const missingCode = await send(server, "PUT", "/api/snippets/greet", { headers: admin(), body: { enabled: true } });
    expect(missingCode.status).toBe(400);
    const missingCodeBody = (await missingCode.json()) as { error: string };
    expect(missingCodeBody.error).toBe("INVALID_SNIPPET");
  });

  it("requires the administrative role", async () => {
    const anonymous = await send(server, "PUT", "/api/snippets/greet", { body: { code: GREET_CODE } });
    expect(anonymous.status).toBe(403);
    expect(await anonymous.json()).toEqual({ error: { code: "ACCESS_DENIED", message: "Access denied" } });

    const editor = await send(server, "GET", "/api/snippets", { headers: bearerAuthHeaders("editor-1", ["content.edit"]) });
    expect(editor.status).toBe(403);

    const forged = await send(server, "GET", "/api/snippets", { headers: { authorization: "Bearer a.b.c" } });
    expect(forged.status).toBe(401);
    expect(await forged.json()).toEqual({ error: { code: "UNAUTHORIZED", message: "Invalid bearer token." } });
  });

  it("lists snippets in creation order and deletes them", async () => {
    await send(server, "PUT", "/api/snippets/alpha", { headers: admin(), body: { code: "return 1;" } });
    await send(server, "PUT", "/api/snippets/beta", { headers: admin(), body: { code: "return 2;" } });

    const listed = await send(server, "GET", "/api/snippets", { headers: admin() });
    const body = (await listed.json()) as { snippets: Array<{ name: string }> };
    expect(body.snippets.map((snippet) => snippet.name)).toEqual(["alpha", "beta"]);

    const removed = await send(server, "DELETE", "/api/snippets/alpha", { headers: admin() });
    expect(removed.status).toBe(204);

    const again = await send(server, "DELETE", "/api/snippets/alpha", { headers: admin() });
    expect(again.status).toBe(404);
  });

  it("test-runs a snippet and reuses the last parameters", async () => {
    await send(server, "PUT", "/api/snippets/greet", { headers: admin(), body: { code: GREET_CODE } });

    const first = await send(server, "POST", "/api/snippets/greet/test", {
      headers: admin(),
      body: { attributes: { name: "Ada" } }
    });
    expect(await first.json()).toEqual({ outcome: "completed", status: "success", output: "Hello, Ada" });

    const repeat = await send(server, "POST", "/api/snippets/greet/test", { headers: admin(), body: {} });
    expect(await repeat.json()).toEqual({ outcome: "completed", status: "success", output: "Hello, Ada" });
  });

  it("includes live output in a test run", async () => {
    await send(server, "PUT", "/api/snippets/ticker", {
      headers: admin(),
      body: { code: 'print("tick "); return "done";', buffer: false }
    });

    const response = await send(server, "POST", "/api/snippets/ticker/test", { headers: admin(), body: {} });
    expect(await response.json()).toEqual({ outcome: "completed", status: "success", output: "tick done" });
  });
});

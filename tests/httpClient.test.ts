import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { MockAgent } from "undici";
import { UndiciHttpClient } from "../src/http/HttpClient.js";

const ORIGIN = "https://raw.githubusercontent.com";

describe("UndiciHttpClient", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it("returns status and body", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/acme/widget/main/README.md", method: "GET" })
      .reply(200, "hello");
    const client = new UndiciHttpClient(1000, agent);
    const res = await client.get(`${ORIGIN}/acme/widget/main/README.md`);
    expect(res.ok).toBe(true);
    if (res.ok) {
      expect(res.response.statusCode).toBe(200);
      expect(res.response.body.toString("utf8")).toBe("hello");
    }
  });

  it("sends the given headers", async () => {
    agent
      .get(ORIGIN)
      .intercept({
        path: "/acme/private/main/a.txt",
        method: "GET",
        headers: { authorization: "Bearer test-token" },
      })
      .reply(200, "secret");
    const client = new UndiciHttpClient(1000, agent);
    const res = await client.get(`${ORIGIN}/acme/private/main/a.txt`, { Authorization: "Bearer test-token" });
    expect(res.ok && res.response.body.toString("utf8")).toBe("secret");
  });

  it("reports error statuses as responses", async () => {
    agent.get(ORIGIN).intercept({ path: "/acme/widget/main/missing", method: "GET" }).reply(404, "404: Not Found");
    const client = new UndiciHttpClient(1000, agent);
    const res = await client.get(`${ORIGIN}/acme/widget/main/missing`);
    expect(res.ok && res.response.statusCode).toBe(404);
  });

  it("turns request failures into an http_error result", async () => {
    const client = new UndiciHttpClient(1000, agent);
    const res = await client.get(`${ORIGIN}/not/intercepted`);
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.code).toBe("http_error");
      expect(res.error.message.startsWith(`GET ${ORIGIN}/not/intercepted failed:`)).toBe(true);
    }
  });
});

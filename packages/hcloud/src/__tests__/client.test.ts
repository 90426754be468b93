import { describe, it, expect, vi, afterEach } from "vitest";
import { ApiError, TimeoutError, TransportError } from "@hcloud-ts/errors";
import { createLogger } from "@hcloud-ts/logger";
import { Client, DEFAULT_ENDPOINT, type FetchFn } from "../client";
import { apiError, createMockApi, json, TEST_ENDPOINT } from "./helpers/mock-api";
import { pageMeta, schemaSSHKey } from "./helpers/fixtures";

/** fetch that never answers and rejects once its signal aborts */
const hangingFetch: FetchFn = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init.signal;
    if (signal?.aborted) {
      reject(new Error("This operation was aborted"));
      return;
    }
    signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")), { once: true });
  });

describe("Client", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("newRequest", () => {
    it("sets auth, accept and user agent headers", () => {
      const client = new Client({ token: "test-secret" });

      const prepared = client.newRequest("GET", "/servers");

      expect(prepared.isOk()).toBe(true);
      const request = prepared.unwrap();
      expect(request.url).toBe(`${DEFAULT_ENDPOINT}/servers`);
      expect(request.headers.Authorization).toBe("Bearer test-secret");
      expect(request.headers.Accept).toBe("application/json");
      expect(request.headers["User-Agent"]).toBe("hcloud-ts/0.1.0");
      expect(request.headers["Content-Type"]).toBeUndefined();
      expect(request.body).toBeUndefined();
    });

    it("serializes a body and sets the content type", () => {
      const client = new Client({ token: "test-secret" });

      const request = client.newRequest("POST", "/ssh_keys", { name: "my-key" }).unwrap();

      expect(request.body).toBe('{"name":"my-key"}');
      expect(request.headers["Content-Type"]).toBe("application/json");
    });

    it("prefixes the user agent with the application name and version", () => {
      const client = new Client({
        token: "test-secret",
        applicationName: "my-app",
        applicationVersion: "1.2.3",
      });

      const request = client.newRequest("GET", "/servers").unwrap();

      expect(request.headers["User-Agent"]).toBe("my-app/1.2.3 hcloud-ts/0.1.0");
    });

    it("prefixes the user agent with the application name alone", () => {
      const client = new Client({ token: "test-secret", applicationName: "my-app" });

      const request = client.newRequest("GET", "/servers").unwrap();

      expect(request.headers["User-Agent"]).toBe("my-app hcloud-ts/0.1.0");
    });

    it("strips trailing slashes from the endpoint", () => {
      const client = new Client({ token: "test-secret", endpoint: "https://api.test/v1//" });

      expect(client.endpoint).toBe("https://api.test/v1");
      expect(client.newRequest("GET", "/servers").unwrap().url).toBe("https://api.test/v1/servers");
    });

    it("returns TransportError when the body cannot be serialized", () => {
      const client = new Client({ token: "test-secret" });

      const prepared = client.newRequest("POST", "/ssh_keys", { size: BigInt(1) });

      expect(prepared.isErr()).toBe(true);
      if (prepared.isErr()) {
        expect(TransportError.is(prepared.error)).toBe(true);
        expect(prepared.error.message).toMatch(/^cannot serialize request body for POST \/ssh_keys: /);
      }
    });
  });

  describe("request", () => {
    it("sends headers and decodes the body", async () => {
      const { client, requests } = createMockApi({
        "GET /ssh_keys/2323": () => json({ ssh_key: schemaSSHKey() }),
      });

      const result = await client.request<{ ssh_key: { id: number } }>("GET", "/ssh_keys/2323", undefined);

      expect(result.isOk()).toBe(true);
      expect(result.unwrap().body.ssh_key.id).toBe(2323);
      expect(result.unwrap().response.httpResponse.status).toBe(200);
      expect(result.unwrap().response.meta).toEqual({});

      expect(requests).toHaveLength(1);
      expect(requests[0].url.toString()).toBe(`${TEST_ENDPOINT}/ssh_keys/2323`);
      expect(requests[0].headers.get("authorization")).toBe("Bearer test-secret");
      expect(requests[0].headers.get("user-agent")).toBe("hcloud-ts/0.1.0");
      expect(requests[0].headers.get("content-type")).toBeNull();
    });

    it("exposes pagination meta", async () => {
      const { client } = createMockApi({
        "GET /ssh_keys": () => json({ ssh_keys: [], meta: pageMeta(2, 3) }),
      });

      const result = await client.request("GET", "/ssh_keys", undefined);

      expect(result.unwrap().response.meta.pagination).toEqual({
        page: 2,
        perPage: 50,
        previousPage: 1,
        nextPage: 3,
        lastPage: 3,
        totalEntries: null,
      });
    });

    it("does not call fetch when serialization fails", async () => {
      const { client, requests } = createMockApi({});

      const result = await client.request("POST", "/ssh_keys", { size: BigInt(1) });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(TransportError.is(result.error)).toBe(true);
      }
      expect(requests).toHaveLength(0);
    });

    it("maps an error body to ApiError", async () => {
      const { client } = createMockApi({
        "GET /servers/1": () => apiError(404, "not_found", "server not found", { id: 1 }),
      });

      const result = await client.request("GET", "/servers/1", undefined);

      expect(result.isErr()).toBe(true);
      if (result.isErr() && ApiError.is(result.error)) {
        expect(result.error.code).toBe("not_found");
        expect(result.error.message).toBe("server not found");
        expect(result.error.statusCode).toBe(404);
        expect(result.error.details).toEqual({ id: 1 });
        expect(result.error.httpResponse.status).toBe(404);
      } else {
        expect.fail("expected ApiError");
      }
    });

    it("keeps error codes the client does not know", async () => {
      const { client } = createMockApi({
        "GET /servers/1": () => apiError(409, "brand_new_code", "something new"),
      });

      const result = await client.request("GET", "/servers/1", undefined);

      if (result.isErr() && ApiError.is(result.error)) {
        expect(result.error.code).toBe("brand_new_code");
        expect(result.error.statusCode).toBe(409);
      } else {
        expect.fail("expected ApiError");
      }
    });

    it("maps an unparseable error body to unknown_error", async () => {
      const { client } = createMockApi({
        "GET /servers/1": () => new Response("<html>bad gateway</html>", { status: 502 }),
      });

      const result = await client.request("GET", "/servers/1", undefined);

      if (result.isErr() && ApiError.is(result.error)) {
        expect(result.error.code).toBe("unknown_error");
        expect(result.error.message).toBe("server responded with status code 502");
        expect(result.error.statusCode).toBe(502);
      } else {
        expect.fail("expected ApiError");
      }
    });

    it("returns TransportError for a success body that is not JSON", async () => {
      const { client } = createMockApi({
        "GET /servers/1": () => new Response("not json", { status: 200 }),
      });

      const result = await client.request("GET", "/servers/1", undefined);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(TransportError.is(result.error)).toBe(true);
        expect(result.error.message).toMatch(/^invalid JSON in response to GET \/servers\/1: /);
      }
    });

    it.each([
      ["null", "null"],
      ["an array", "[1,2]"],
      ["a string", '"ok"'],
    ])("returns TransportError for a success body that is %s", async (_label, text) => {
      const { client } = createMockApi({
        "GET /servers/1": () => new Response(text, { status: 200 }),
      });

      const result = await client.request("GET", "/servers/1", undefined);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(TransportError.is(result.error)).toBe(true);
        expect(result.error.message).toBe("unexpected response body for GET /servers/1: expected a JSON object");
      }
    });

    it("returns TransportError when fetch rejects", async () => {
      const client = new Client({
        token: "test-secret",
        endpoint: TEST_ENDPOINT,
        fetch: async () => {
          throw new TypeError("fetch failed");
        },
      });

      const result = await client.request("GET", "/servers/1", undefined);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(TransportError.is(result.error)).toBe(true);
        expect(result.error.message).toBe("GET /servers/1 failed: fetch failed");
      }
    });

    it("returns TimeoutError when the deadline passes", async () => {
      const client = new Client({
        token: "test-secret",
        endpoint: TEST_ENDPOINT,
        timeoutMs: 20,
        fetch: hangingFetch,
      });

      const result = await client.request("GET", "/servers/1", undefined);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(TimeoutError.is(result.error)).toBe(true);
        expect(result.error.message).toBe("GET /servers/1 timed out after 20ms");
      }
    });

    it("returns TransportError when the caller aborts", async () => {
      const client = new Client({
        token: "test-secret",
        endpoint: TEST_ENDPOINT,
        timeoutMs: 5_000,
        fetch: hangingFetch,
      });
      const controller = new AbortController();

      const pending = client.request("GET", "/servers/1", undefined, { signal: controller.signal });
      controller.abort();
      const result = await pending;

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(TransportError.is(result.error)).toBe(true);
        expect(result.error.message).toBe("GET /servers/1 failed: This operation was aborted");
      }
    });

    it("does not send when the signal is already aborted", async () => {
      const fetchFn = vi.fn(hangingFetch);
      const client = new Client({ token: "test-secret", endpoint: TEST_ENDPOINT, fetch: fetchFn });
      const controller = new AbortController();
      controller.abort();

      const result = await client.request("GET", "/servers/1", undefined, { signal: controller.signal });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(TransportError.is(result.error)).toBe(true);
        expect(result.error.message).toBe("GET /servers/1 aborted before it was sent");
      }
      expect(fetchFn).not.toHaveBeenCalled();
    });
  });

  describe("do", () => {
    it("sends a prepared request", async () => {
      const { client, requests } = createMockApi({
        "POST /ssh_keys": () => json({ ssh_key: schemaSSHKey() }, 201),
      });
      const body = { name: "my-key", public_key: "ssh-ed25519 AAAAtestkey" };

      const prepared = client.newRequest("POST", "/ssh_keys", body).unwrap();
      const result = await client.do<{ ssh_key: { name: string } }>(prepared);

      expect(result.unwrap().body.ssh_key.name).toBe("my-key");
      expect(result.unwrap().response.httpResponse.status).toBe(201);
      expect(requests[0].method).toBe("POST");
      expect(requests[0].body).toEqual(body);
      expect(requests[0].headers.get("content-type")).toBe("application/json");
    });
  });

  describe("requestEmpty", () => {
    it("accepts an empty 204 response", async () => {
      const { client, requests } = createMockApi({
        "DELETE /ssh_keys/2323": () => new Response(null, { status: 204 }),
      });

      const result = await client.requestEmpty("DELETE", "/ssh_keys/2323");

      expect(result.isOk()).toBe(true);
      expect(result.unwrap().httpResponse.status).toBe(204);
      expect(result.unwrap().meta).toEqual({});
      expect(requests[0].method).toBe("DELETE");
      expect(requests[0].body).toBeUndefined();
    });
  });

  describe("logging", () => {
    it("logs request and response at debug level with a request id", async () => {
      const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
      const { client } = createMockApi(
        { "GET /ssh_keys/2323": () => json({ ssh_key: schemaSSHKey() }) },
        { logger: createLogger({ component: "hcloud-test" }, { level: "debug" }) }
      );

      await client.request("GET", "/ssh_keys/2323", undefined);

      expect(debug).toHaveBeenCalledTimes(2);
      const sent = JSON.parse(String(debug.mock.calls[0][0]));
      const received = JSON.parse(String(debug.mock.calls[1][0]));
      expect(sent.message).toBe("request");
      expect(sent.component).toBe("hcloud-test");
      expect(sent.method).toBe("GET");
      expect(sent.path).toBe("/ssh_keys/2323");
      expect(sent.requestId).toMatch(/^req_[0-9a-z]{12}$/);
      expect(received.message).toBe("response");
      expect(received.status).toBe(200);
      expect(received.requestId).toBe(sent.requestId);
    });

    it("stays quiet with the default logger", async () => {
      const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
      const { client } = createMockApi({
        "GET /ssh_keys/2323": () => json({ ssh_key: schemaSSHKey() }),
      });

      await client.request("GET", "/ssh_keys/2323", undefined);

      expect(debug).not.toHaveBeenCalled();
    });
  });
});

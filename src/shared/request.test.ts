import { describe, it, expect } from "vitest";
import {
  computeRequestHash,
  createRequest,
  decodeBody,
  getHeader,
  getQueryParameters,
  getRequestHost,
  getRequestPath,
  isHttpMethod,
  parseUrl,
  requestBodyAsText,
  requestsEqual,
} from "./request.js";

describe("createRequest", () => {
  it("derives the hash from url, method and timestamp", () => {
    const request = createRequest({ url: "https://example.com/a", method: "GET", timestamp: 1000 });
    expect(request.hash).toBe(computeRequestHash("https://example.com/a", "GET", 1000));
    expect(request.hash).toMatch(/^[0-9a-f]{40}$/);
  });

  it("gives different hashes to different methods", () => {
    const get = createRequest({ url: "https://example.com", method: "GET", timestamp: 1 });
    const post = createRequest({ url: "https://example.com", method: "POST", timestamp: 1 });
    expect(get.hash).not.toBe(post.hash);
  });

  it("copies headers and omits an absent body", () => {
    const headers = { Accept: "text/html" };
    const request = createRequest({ url: "https://example.com", method: "GET", headers });
    headers.Accept = "changed";
    expect(request.headers).toEqual({ Accept: "text/html" });
    expect("body" in request).toBe(false);
  });
});

describe("isHttpMethod", () => {
  it("accepts the supported verbs only", () => {
    expect(isHttpMethod("PATCH")).toBe(true);
    expect(isHttpMethod("get")).toBe(false);
    expect(isHttpMethod("BREW")).toBe(false);
  });
});

describe("URL helpers", () => {
  const request = createRequest({
    url: "https://api.example.com:8443/v1/users?page=2&sort=name",
    method: "GET",
  });

  it("extracts host, path and query", () => {
    expect(getRequestHost(request)).toBe("api.example.com");
    expect(getRequestPath(request)).toBe("/v1/users");
    expect(getQueryParameters(request)).toEqual({ page: "2", sort: "name" });
  });

  it("yields no host or path for an unparseable URL", () => {
    expect(parseUrl("not a url")).toEqual({ query: {} });
  });
});

describe("decodeBody", () => {
  it("decodes UTF-8 text", () => {
    expect(decodeBody(Buffer.from("héllo", "utf8"))).toBe("héllo");
  });

  it("returns undefined for invalid bytes", () => {
    expect(decodeBody(Buffer.from([0xff, 0xfe, 0xfd]))).toBeUndefined();
  });

  it("honours a charset and falls back to UTF-8 for unknown labels", () => {
    expect(decodeBody(Buffer.from([0xe9]), "iso-8859-1")).toBe("é");
    expect(decodeBody(Buffer.from("ok"), "no-such-charset")).toBe("ok");
  });

  it("returns undefined without a body", () => {
    expect(decodeBody(undefined)).toBeUndefined();
  });

  it("is used for request bodies", () => {
    const request = createRequest({
      url: "https://example.com",
      method: "POST",
      body: Buffer.from('{"a":1}'),
    });
    expect(requestBodyAsText(request)).toBe('{"a":1}');
  });
});

describe("requestsEqual", () => {
  it("compares url, method, headers and body but not timestamp", () => {
    const a = createRequest({
      url: "https://example.com",
      method: "POST",
      headers: { "X-A": "1" },
      body: Buffer.from("x"),
      timestamp: 1,
    });
    const b = createRequest({
      url: "https://example.com",
      method: "POST",
      headers: { "X-A": "1" },
      body: Buffer.from("x"),
      timestamp: 2,
    });
    const c = createRequest({
      url: "https://example.com",
      method: "POST",
      headers: { "X-A": "2" },
      body: Buffer.from("x"),
      timestamp: 1,
    });
    expect(requestsEqual(a, b)).toBe(true);
    expect(requestsEqual(a, c)).toBe(false);
  });
});

describe("getHeader", () => {
  it("looks up names case-insensitively", () => {
    const headers = { "content-type": "application/json" };
    expect(getHeader(headers, "Content-Type")).toBe("application/json");
    expect(getHeader(headers, "Accept")).toBeUndefined();
  });
});

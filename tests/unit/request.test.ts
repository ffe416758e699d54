import { describe, it, expect } from "vitest";
import { Request } from "../../src/request";
import { Uri } from "../../src/uri";
import { streamFor } from "../../src/stream";
import { InvalidArgumentError, MalformedUriError } from "../../src/errors";

describe("Request", () => {
  it("normalizes the method and writes Host from the URI", () => {
    const request = new Request("get", "http://example.com:8080/path?x=1");
    expect(request.getMethod()).toBe("GET");
    expect(request.isGet()).toBe(true);
    expect(request.getHeaders()).toEqual({ Host: ["example.com:8080"] });
    expect(request.getRequestTarget()).toBe("/path?x=1");
    expect(request.getProtocolVersion()).toBe("1.1");
  });

  it("puts Host before the given headers", () => {
    const request = new Request("POST", "http://example.com/", {
      "Content-Type": "text/plain",
    });
    expect(Object.keys(request.getHeaders())).toEqual(["Host", "Content-Type"]);
    expect(request.getHeaderLine("host")).toBe("example.com");
  });

  it("keeps a Host header that was given", () => {
    const request = new Request("GET", "http://example.com/", {
      host: "other.test",
    });
    expect(request.getHeaderLine("Host")).toBe("other.test");
  });

  it("writes no Host for URIs without a host", () => {
    const request = new Request("GET", "/relative");
    expect(request.hasHeader("Host")).toBe(false);
    expect(request.getRequestTarget()).toBe("/relative");
  });

  it("uses / as the target of an empty path", () => {
    expect(new Request("GET", "http://example.com").getRequestTarget()).toBe(
      "/",
    );
  });

  it("rejects bad methods and URIs", () => {
    expect(() => new Request("", "/")).toThrow(InvalidArgumentError);
    expect(() => new Request("BAD METHOD", "/")).toThrow(InvalidArgumentError);
    expect(() => new Request("GET", "http://")).toThrow(MalformedUriError);
  });

  describe("withUri", () => {
    const request = new Request("GET", "http://example.com/");

    it("returns itself for the same URI", () => {
      expect(request.withUri(request.getUri())).toBe(request);
    });

    it("rewrites Host as the first header", () => {
      const next = request
        .withHeader("Accept", "*/*")
        .withUri(Uri.parse("https://other.test:8443/"));
      expect(Object.keys(next.getHeaders())).toEqual(["Host", "Accept"]);
      expect(next.getHeaderLine("Host")).toBe("other.test:8443");
      expect(request.getHeaderLine("Host")).toBe("example.com");
    });

    it("keeps Host when asked to", () => {
      const next = request.withUri(Uri.parse("https://other.test/"), true);
      expect(next.getHeaderLine("Host")).toBe("example.com");
      expect(next.getUri().getHost()).toBe("other.test");
    });

    it("keeps the original case of the Host name", () => {
      const upper = new Request("GET", "http://a.test/", { HOST: "a.test" });
      const next = upper.withUri(Uri.parse("http://b.test/"));
      expect(next.getHeaders()).toEqual({ HOST: ["b.test"] });
    });

    it("leaves Host alone for URIs without a host", () => {
      const next = request.withUri(Uri.parse("/only/path"));
      expect(next.getHeaderLine("Host")).toBe("example.com");
    });
  });

  it("keeps a removed Host header removed across changes", () => {
    const request = new Request("GET", "http://example.com/")
      .withoutHeader("Host")
      .withMethod("POST");
    expect(request.hasHeader("Host")).toBe(false);
    expect(request.isPost()).toBe(true);
  });

  it("sets an explicit request target", () => {
    const request = new Request("OPTIONS", "http://example.com/a");
    const star = request.withRequestTarget("*");
    expect(star.getRequestTarget()).toBe("*");
    expect(star.withMethod("GET").getRequestTarget()).toBe("*");
    expect(() => request.withRequestTarget("/a b")).toThrow(
      "[uri-kit] Invalid request target provided; cannot contain whitespace.",
    );
  });

  it("changes method and protocol version", () => {
    const request = new Request("GET", "/");
    expect(request.withMethod("get")).toBe(request);
    expect(request.withMethod("put").isPut()).toBe(true);
    expect(request.withMethod("PATCH").isPatch()).toBe(true);
    expect(request.withMethod("delete").isDelete()).toBe(true);
    expect(request.withProtocolVersion("1.1")).toBe(request);
    expect(request.withProtocolVersion("2").getProtocolVersion()).toBe("2");
    expect(() => request.withProtocolVersion("x")).toThrow(
      InvalidArgumentError,
    );
  });

  it("edits headers without touching the original", () => {
    const request = new Request("GET", "/");
    const next = request
      .withHeader("X-A", "1")
      .withAddedHeader("x-a", "2")
      .withHeaders({ "X-a": "3", "X-B": ["4", "5"] });
    expect(next.getHeaderLine("X-A")).toBe("1, 2, 3");
    expect(next.getHeader("x-b")).toEqual(["4", "5"]);
    expect(request.hasHeader("X-A")).toBe(false);
    expect(next.withoutHeader("missing")).toBe(next);
  });

  it("holds a body stream", () => {
    const request = new Request("POST", "/", {}, "payload");
    expect(request.getBody().toString()).toBe("payload");
    expect(request.withBody(request.getBody())).toBe(request);
    const body = streamFor("other");
    expect(request.withBody(body).getBody()).toBe(body);
    expect(new Request("GET", "/").getBody().getSize()).toBe(0);
  });

  it("reads Accept-Language entries with qualities", () => {
    const request = new Request("GET", "/", {
      "Accept-Language": "en-US, fr;q=0.8, de;q=0.5",
    });
    expect(request.getAcceptLanguages()).toEqual([
      { language: "en-US", quality: 1 },
      { language: "fr", quality: 0.8 },
      { language: "de", quality: 0.5 },
    ]);
    expect(new Request("GET", "/").getAcceptLanguages()).toEqual([]);
  });

  it("reads Accept-Encoding codings", () => {
    const request = new Request("GET", "/", {
      "Accept-Encoding": "gzip, deflate;q=0.5, br",
    });
    expect(request.getAcceptEncodings()).toEqual(["gzip", "deflate", "br"]);
    expect(new Request("GET", "/").getAcceptEncodings()).toEqual([]);
  });
});

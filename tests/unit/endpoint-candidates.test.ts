import { describe, expect, it } from "vitest";
import {
  buildEndpointCandidates,
  normalizeBaseUrl
} from "../../src/utils/endpoint-candidates.js";

describe("buildEndpointCandidates", () => {
  it("expands localhost into loopback and api path variants", () => {
    const candidates = buildEndpointCandidates("http://localhost:1234/v1");
    expect(candidates).toEqual([
      "http://localhost:1234/v1",
      "http://localhost:1234/api/v0",
      "http://localhost:1234",
      "http://127.0.0.1:1234/v1",
      "http://127.0.0.1:1234/api/v0",
      "http://127.0.0.1:1234",
      "http://[::1]:1234/v1",
      "http://[::1]:1234/api/v0",
      "http://[::1]:1234"
    ]);
    expect(new Set(candidates).size).toBe(candidates.length);
  });

  it("keeps the configured loopback spelling first", () => {
    const candidates = buildEndpointCandidates("http://127.0.0.1:1234/v1");
    expect(candidates.slice(0, 4)).toEqual([
      "http://127.0.0.1:1234/v1",
      "http://127.0.0.1:1234/api/v0",
      "http://127.0.0.1:1234",
      "http://localhost:1234/v1"
    ]);
    expect(candidates.indexOf("http://127.0.0.1:1234/v1")).toBeLessThan(
      candidates.indexOf("http://localhost:1234/v1")
    );
  });

  it("reattaches the port to bracketed IPv6 hosts", () => {
    const candidates = buildEndpointCandidates("http://[::1]:8080/api/v0/");
    expect(candidates[0]).toBe("http://[::1]:8080/api/v0");
    expect(candidates).toContain("http://[::1]:8080/v1");
    expect(candidates).toContain("http://localhost:8080/api/v0");
    expect(candidates).toContain("http://127.0.0.1:8080");
  });

  it("does not add loopback hosts for remote servers", () => {
    expect(buildEndpointCandidates("https://lm.example.test/api/v0")).toEqual([
      "https://lm.example.test/api/v0",
      "https://lm.example.test/v1",
      "https://lm.example.test"
    ]);
  });

  it("keeps a path prefix in front of the api suffix", () => {
    expect(buildEndpointCandidates("http://gateway.test:9000/llm/v1")).toEqual([
      "http://gateway.test:9000/llm/v1",
      "http://gateway.test:9000/llm/api/v0",
      "http://gateway.test:9000/llm"
    ]);
  });

  it("reads a bare host as http", () => {
    expect(buildEndpointCandidates("lm.example.test:1234")[0]).toBe(
      "http://lm.example.test:1234"
    );
  });

  it("falls back to the raw value when it cannot be parsed", () => {
    expect(buildEndpointCandidates("http://")).toEqual(["http:"]);
    expect(buildEndpointCandidates("   ")).toEqual([]);
  });
});

describe("normalizeBaseUrl", () => {
  it("strips trailing slashes and query strings", () => {
    expect(normalizeBaseUrl("http://localhost:1234/v1/?x=1")).toBe("http://localhost:1234/v1");
  });
});

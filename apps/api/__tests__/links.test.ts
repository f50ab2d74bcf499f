/**
 * Short URL Routes E2E Tests
 *
 * Create, redirect and stats flows through fastify.inject().
 */

import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import { createTestApp, type TestContext } from "./setup.js";

const MINUTE = 60_000;

describe("Short URL Routes", () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  async function create(payload: Record<string, unknown>) {
    return ctx.app.inject({ method: "POST", url: "/shorturls", payload });
  }

  // ==========================================================================
  // POST /shorturls
  // ==========================================================================

  describe("POST /shorturls", () => {
    it("should create a link with a custom shortcode", async () => {
      const res = await create({ url: "https://example.com/page", shortcode: "abcd" });

      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({
        shortLink: "http://short.test/abcd",
        expiry: "2026-01-01T00:30:00.000Z",
      });
    });

    it("should generate a shortcode when none is given", async () => {
      const res = await create({ url: "https://example.com/page" });

      expect(res.statusCode).toBe(201);
      expect(res.json().shortLink).toMatch(/^http:\/\/short\.test\/[A-Za-z0-9]{6}$/);
      expect(ctx.registry.size()).toBe(1);
    });

    it("should apply the requested validity", async () => {
      const res = await create({ url: "https://example.com", validity: 120, shortcode: "abcd" });

      expect(res.json().expiry).toBe("2026-01-01T02:00:00.000Z");
    });

    it("should treat null validity and shortcode as omitted", async () => {
      const res = await create({ url: "https://example.com", validity: null, shortcode: null });

      expect(res.statusCode).toBe(201);
      expect(res.json().expiry).toBe("2026-01-01T00:30:00.000Z");
    });

    it("should reject a missing url", async () => {
      const res = await create({});

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({
        success: false,
        error: "URL is required",
        errorCode: "INVALID_URL",
      });
    });

    it("should reject a malformed url", async () => {
      const res = await create({ url: "not-a-url" });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        success: false,
        error: "Invalid URL format",
        errorCode: "INVALID_URL",
        details: { url: ["Invalid URL format"] },
      });
    });

    it("should reject a non-http url", async () => {
      const res = await create({ url: "ftp://files.example.com/a" });

      expect(res.statusCode).toBe(400);
      expect(res.json().errorCode).toBe("INVALID_URL");
      expect(ctx.registry.size()).toBe(0);
    });

    it.each([
      [0, "Validity must be greater than 0"],
      [-10, "Validity must be greater than 0"],
      [1.5, "Validity must be an integer"],
      ["10", "Validity must be a number of minutes"],
    ])("should reject validity %p", async (validity, message) => {
      const res = await create({ url: "https://example.com", validity });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({
        success: false,
        error: message,
        errorCode: "INVALID_VALIDITY",
      });
    });

    it("should accept the longest allowed validity", async () => {
      const res = await create({ url: "https://example.com", validity: 52_560_000, shortcode: "long" });

      expect(res.statusCode).toBe(201);
      expect(res.json().expiry).toBe("2125-12-08T00:00:00.000Z");
    });

    it("should reject a validity past the maximum and leave the code free", async () => {
      const res = await create({ url: "https://example.com", validity: 200_000_000_000, shortcode: "huge" });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({
        success: false,
        error: "Validity must be at most 52560000 minutes",
        errorCode: "INVALID_VALIDITY",
      });
      expect(ctx.registry.has("huge")).toBe(false);

      const stats = await ctx.app.inject({ method: "GET", url: "/shorturls/huge" });
      expect(stats.statusCode).toBe(404);

      const retry = await create({ url: "https://example.com", validity: 10, shortcode: "huge" });
      expect(retry.statusCode).toBe(201);
    });

    it.each([
      ["ab", "Shortcode must be at least 4 characters long"],
      ["bad-code", "Shortcode can only contain alphanumeric characters"],
      ["has space", "Shortcode can only contain alphanumeric characters"],
    ])("should reject shortcode %p", async (shortcode, message) => {
      const res = await create({ url: "https://example.com", shortcode });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({
        success: false,
        error: message,
        errorCode: "INVALID_CODE",
      });
    });

    it("should reject a shortcode that is already taken", async () => {
      await create({ url: "https://a.example", shortcode: "abcd" });

      const res = await create({ url: "https://b.example", shortcode: "abcd" });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        success: false,
        error: "Shortcode already exists",
        errorCode: "CODE_TAKEN",
      });
    });

    it("should keep an expired shortcode reserved", async () => {
      await create({ url: "https://a.example", shortcode: "abcd", validity: 1 });
      ctx.advance(10 * MINUTE);

      const res = await create({ url: "https://b.example", shortcode: "abcd" });

      expect(res.json().errorCode).toBe("CODE_TAKEN");
    });

    it("should accept exactly one of many concurrent creates for the same code", async () => {
      const responses = await Promise.all(
        Array.from({ length: 20 }, (_, i) =>
          create({ url: `https://example.com/${i}`, shortcode: "race" })
        )
      );

      const statuses = responses.map((res) => res.statusCode);
      expect(statuses.filter((s) => s === 201)).toHaveLength(1);
      expect(statuses.filter((s) => s === 400)).toHaveLength(19);
      expect(ctx.registry.size()).toBe(1);
    });

    it("should reject a body that is not JSON", async () => {
      const res = await ctx.app.inject({
        method: "POST",
        url: "/shorturls",
        headers: { "content-type": "application/json" },
        payload: "{not json",
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().success).toBe(false);
    });
  });

  // ==========================================================================
  // GET /:shortcode
  // ==========================================================================

  describe("GET /:shortcode", () => {
    beforeEach(async () => {
      await create({ url: "https://example.com/page", shortcode: "abcd", validity: 1 });
    });

    it("should redirect to the original url", async () => {
      const res = await ctx.app.inject({ method: "GET", url: "/abcd" });

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe("https://example.com/page");
      expect(res.headers["cache-control"]).toBe("no-store");
    });

    it("should record the click", async () => {
      await ctx.app.inject({
        method: "GET",
        url: "/abcd",
        headers: {
          "user-agent": "test-agent/1.0",
          referer: "https://news.example/post",
        },
      });

      const [click] = ctx.registry.get("abcd").clicks;
      expect(click).toEqual({
        timestamp: new Date("2026-01-01T00:00:00.000Z"),
        source: "https://news.example/post",
        userAgent: "test-agent/1.0",
        ip: "127.0.0.1",
        geo: "Localhost",
      });
    });

    it("should take the client ip from X-Forwarded-For", async () => {
      await ctx.app.inject({
        method: "GET",
        url: "/abcd",
        headers: { "x-forwarded-for": "203.0.113.7" },
      });

      const [click] = ctx.registry.get("abcd").clicks;
      expect(click?.ip).toBe("203.0.113.7");
      expect(click?.geo).toBe("Unknown Location");
      expect(click?.source).toBe("direct");
    });

    it("should count every concurrent redirect", async () => {
      await Promise.all(
        Array.from({ length: 30 }, () => ctx.app.inject({ method: "GET", url: "/abcd" }))
      );

      expect(ctx.registry.get("abcd").clicks).toHaveLength(30);
    });

    it("should return 404 for an unknown shortcode", async () => {
      const res = await ctx.app.inject({ method: "GET", url: "/zzzz" });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({
        success: false,
        error: "Short URL not found",
        errorCode: "NOT_FOUND",
      });
    });

    it("should treat shortcodes as case-sensitive", async () => {
      const res = await ctx.app.inject({ method: "GET", url: "/ABCD" });
      expect(res.statusCode).toBe(404);
    });

    it("should return 410 once the link has expired", async () => {
      ctx.advance(MINUTE);

      const res = await ctx.app.inject({ method: "GET", url: "/abcd" });

      expect(res.statusCode).toBe(410);
      expect(res.json()).toEqual({
        success: false,
        error: "Short URL has expired",
        errorCode: "EXPIRED",
      });
      expect(ctx.registry.get("abcd").clicks).toHaveLength(0);
    });

    it("should still redirect one millisecond before expiry", async () => {
      ctx.advance(MINUTE - 1);

      const res = await ctx.app.inject({ method: "GET", url: "/abcd" });

      expect(res.statusCode).toBe(302);
    });
  });

  // ==========================================================================
  // GET /shorturls/:shortcode
  // ==========================================================================

  describe("GET /shorturls/:shortcode", () => {
    it("should return stats with the click log", async () => {
      await create({ url: "https://example.com/page", shortcode: "abcd", validity: 10 });
      await ctx.app.inject({
        method: "GET",
        url: "/abcd",
        headers: { "user-agent": "test-agent/1.0" },
      });
      ctx.advance(MINUTE);
      await ctx.app.inject({
        method: "GET",
        url: "/abcd",
        headers: {
          "user-agent": "test-agent/2.0",
          referer: "https://news.example/post",
          "x-forwarded-for": "203.0.113.7",
        },
      });

      const res = await ctx.app.inject({ method: "GET", url: "/shorturls/abcd" });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        shortcode: "abcd",
        original_url: "https://example.com/page",
        total_clicks: 2,
        created_at: "2026-01-01T00:00:00.000Z",
        expiry: "2026-01-01T00:10:00.000Z",
        clicks_data: [
          {
            timestamp: "2026-01-01T00:00:00.000Z",
            source: "direct",
            user_agent: "test-agent/1.0",
            ip: "127.0.0.1",
            geographical_info: "Localhost",
          },
          {
            timestamp: "2026-01-01T00:01:00.000Z",
            source: "https://news.example/post",
            user_agent: "test-agent/2.0",
            ip: "203.0.113.7",
            geographical_info: "Unknown Location",
          },
        ],
        is_expired: false,
      });
    });

    it("should return the same body for repeated reads", async () => {
      await create({ url: "https://example.com", shortcode: "abcd" });
      await ctx.app.inject({ method: "GET", url: "/abcd" });

      const first = await ctx.app.inject({ method: "GET", url: "/shorturls/abcd" });
      const second = await ctx.app.inject({ method: "GET", url: "/shorturls/abcd" });

      expect(second.json()).toEqual(first.json());
      expect(second.json().total_clicks).toBe(1);
    });

    it("should not count stats reads as clicks", async () => {
      await create({ url: "https://example.com", shortcode: "abcd" });

      await ctx.app.inject({ method: "GET", url: "/shorturls/abcd" });
      const res = await ctx.app.inject({ method: "GET", url: "/shorturls/abcd" });

      expect(res.json().total_clicks).toBe(0);
    });

    it("should report expired links", async () => {
      await create({ url: "https://example.com", shortcode: "abcd", validity: 1 });
      ctx.advance(2 * MINUTE);

      const res = await ctx.app.inject({ method: "GET", url: "/shorturls/abcd" });

      expect(res.statusCode).toBe(200);
      expect(res.json().is_expired).toBe(true);
    });

    it("should return 404 for an unknown shortcode", async () => {
      const res = await ctx.app.inject({ method: "GET", url: "/shorturls/zzzz" });

      expect(res.statusCode).toBe(404);
      expect(res.json().errorCode).toBe("NOT_FOUND");
    });

    it("should hide unexpected errors behind a 500", async () => {
      jest.spyOn(ctx.services.reporter, "report").mockImplementation(() => {
        throw new Error("unexpected");
      });

      const res = await ctx.app.inject({ method: "GET", url: "/shorturls/abcd" });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({
        success: false,
        error: "Internal server error",
        errorCode: "INTERNAL",
      });
    });
  });

  // ==========================================================================
  // Fallbacks
  // ==========================================================================

  describe("unknown routes", () => {
    it("should return the error envelope", async () => {
      const res = await ctx.app.inject({ method: "GET", url: "/no/such/route" });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({
        success: false,
        error: "Not Found",
        errorCode: "NOT_FOUND",
      });
    });
  });
});

describe("Short URL Routes behind no proxy", () => {
  it("should ignore X-Forwarded-For when trustProxy is off", async () => {
    const ctx = await createTestApp({ trustProxy: false });
    await ctx.app.inject({
      method: "POST",
      url: "/shorturls",
      payload: { url: "https://example.com", shortcode: "abcd" },
    });

    await ctx.app.inject({
      method: "GET",
      url: "/abcd",
      headers: { "x-forwarded-for": "203.0.113.7" },
    });

    expect(ctx.registry.get("abcd").clicks[0]?.ip).toBe("127.0.0.1");
    await ctx.app.close();
  });
});

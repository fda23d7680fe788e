import { describe, it, expect, beforeEach } from "vitest";
import {
  createTestContext,
  jsonRequest,
  signup,
  TEST_PASSWORD,
  tokenOf,
  type TestContext,
} from "@/test/testDatabase";

describe("auth routes", () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  describe("GET /health", () => {
    it("should report ok without authentication", async () => {
      const res = await ctx.app.request("/health");
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "ok" });
    });
  });

  describe("POST /signup", () => {
    it("should create a parent", async () => {
      const res = await signup(ctx.app, { username: "mom", role: "parent" });
      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({ message: "user created" });
    });

    it("should reject a duplicate username after normalization", async () => {
      await signup(ctx.app, { username: "mom", role: "parent" });
      const res = await signup(ctx.app, { username: "  MOM", role: "parent" });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Username exists" });
    });

    it("should reject a child without a parent", async () => {
      const res = await signup(ctx.app, { username: "kid1", role: "child" });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "child must include parent_username",
      });
    });

    it("should reject a child whose parent is not a parent", async () => {
      await signup(ctx.app, { username: "mom", role: "parent" });
      await signup(ctx.app, {
        username: "kid1",
        role: "child",
        parent_username: "mom",
      });
      const res = await signup(ctx.app, {
        username: "kid2",
        role: "child",
        parent_username: "kid1",
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "parent_username not found or not a parent",
      });
    });

    it("should accept an empty password and log in with it", async () => {
      const created = await ctx.app.request(
        "/signup",
        jsonRequest("POST", { username: "mom", password: "", role: "parent" })
      );
      expect(created.status).toBe(201);

      const res = await ctx.app.request(
        "/login",
        jsonRequest("POST", { username: "mom", password: "" })
      );
      expect(res.status).toBe(200);
    });

    it("should reject an unknown role", async () => {
      const res = await ctx.app.request(
        "/signup",
        jsonRequest("POST", { username: "x", password: "pw", role: "admin" })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "Invalid request body",
        issues: [expect.stringMatching(/^role: /)],
      });
    });

    it("should reject a body that is not JSON", async () => {
      const res = await ctx.app.request("/signup", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid JSON body" });
    });
  });

  describe("POST /login", () => {
    beforeEach(async () => {
      await signup(ctx.app, { username: "mom", role: "parent" });
    });

    it("should return a bearer token and the role", async () => {
      const res = await ctx.app.request(
        "/login",
        jsonRequest("POST", { username: " Mom ", password: TEST_PASSWORD })
      );

      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      const token = tokenOf(body);
      expect(body).toEqual({
        token,
        access_token: token,
        token_type: "bearer",
        role: "parent",
      });
      expect(await ctx.sessions.resolve(token)).toBe("mom");
    });

    it("should answer a wrong password and an unknown user identically", async () => {
      const wrongPassword = await ctx.app.request(
        "/login",
        jsonRequest("POST", { username: "mom", password: "wrong" })
      );
      const unknownUser = await ctx.app.request(
        "/login",
        jsonRequest("POST", { username: "nobody", password: TEST_PASSWORD })
      );

      expect(wrongPassword.status).toBe(401);
      expect(unknownUser.status).toBe(401);
      const first = await wrongPassword.text();
      expect(first).toBe(await unknownUser.text());
      expect(JSON.parse(first)).toEqual({ error: "Invalid credentials" });
    });
  });

  describe("unknown routes", () => {
    it("should answer 404 with an error body", async () => {
      const res = await ctx.app.request("/nope");
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Not Found" });
    });
  });

  describe("CORS", () => {
    it("should echo an allowed origin", async () => {
      const res = await ctx.app.request("/health", {
        headers: { Origin: "http://localhost:3000" },
      });
      expect(res.headers.get("Access-Control-Allow-Origin")).toBe(
        "http://localhost:3000"
      );
    });

    it("should not allow an unknown origin", async () => {
      const res = await ctx.app.request("/health", {
        headers: { Origin: "https://evil.example.com" },
      });
      expect(res.headers.get("Access-Control-Allow-Origin")).toBeNull();
    });
  });
});

import { readyState, unavailableState } from "@domain/memory/engineState";
import type { MemoryEngine } from "@domain/memory/ports";
import type { Server } from "http";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createApp, listen } from "./httpApp";

function fakeEngine() {
  return {
    extractAndStore: vi.fn<MemoryEngine["extractAndStore"]>(),
    search: vi.fn<MemoryEngine["search"]>(),
    listAll: vi.fn<MemoryEngine["listAll"]>(),
    deleteAll: vi.fn<MemoryEngine["deleteAll"]>(),
  };
}

describe("memory gateway HTTP API", () => {
  let engine: ReturnType<typeof fakeEngine>;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    engine = fakeEngine();
    app = createApp(readyState(engine));
  });

  it("GET / reports a running service", async () => {
    const res = await request(app).get("/");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      service: "Memory Gateway",
      status: "running",
      version: "1.0.0",
    });
  });

  it("GET /health is healthy", async () => {
    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "healthy" });
  });

  it("POST /add stores a conversation with default metadata", async () => {
    const raw = { results: [{ id: "m1", memory: "Likes tea", event: "ADD" }] };
    engine.extractAndStore.mockResolvedValue(raw);

    const res = await request(app)
      .post("/add")
      .send({
        messages: [{ role: "user", content: "I like tea" }],
        user_id: "alice",
      });

    expect(res.status).toBe(200);
    expect(engine.extractAndStore).toHaveBeenCalledWith(
      [{ role: "user", content: "I like tea" }],
      "alice",
      {}
    );
    expect(res.body).toEqual({
      success: true,
      result: raw,
      message: "Memories extracted and stored",
    });
  });

  it("POST /add defaults the user id", async () => {
    engine.extractAndStore.mockResolvedValue({ results: [] });

    await request(app)
      .post("/add")
      .send({ messages: [{ role: "user", content: "hi" }], metadata: { k: 1 } });

    expect(engine.extractAndStore).toHaveBeenCalledWith(
      [{ role: "user", content: "hi" }],
      "default_user",
      { k: 1 }
    );
  });

  it("POST /search returns normalized memories", async () => {
    engine.search.mockResolvedValue({
      results: [{ id: "1", memory: "likes tea", score: 0.9 }],
    });

    const res = await request(app)
      .post("/search")
      .send({ query: "drink preference", user_id: "alice", limit: 5 });

    expect(res.status).toBe(200);
    expect(engine.search).toHaveBeenCalledWith("drink preference", "alice", 5);
    expect(res.body).toEqual({
      success: true,
      count: 1,
      memories: [{ id: "1", memory: "likes tea", score: 0.9, metadata: {} }],
    });
  });

  it("POST /search defaults user id and limit", async () => {
    engine.search.mockResolvedValue([]);

    const res = await request(app).post("/search").send({ query: "tea" });

    expect(res.body).toEqual({ success: true, count: 0, memories: [] });
    expect(engine.search).toHaveBeenCalledWith("tea", "default_user", 5);
  });

  it("POST /search rejects a body without a query", async () => {
    const res = await request(app).post("/search").send({ limit: 2 });

    expect(res.status).toBe(422);
    expect(res.body.detail).toBe("Invalid request");
    expect(engine.search).not.toHaveBeenCalled();
  });

  it("POST /search accepts an integer limit sent as a string", async () => {
    engine.search.mockResolvedValue([]);

    const res = await request(app)
      .post("/search")
      .send({ query: "tea", limit: "3" });

    expect(res.status).toBe(200);
    expect(engine.search).toHaveBeenCalledWith("tea", "default_user", 3);
  });

  it("POST /search rejects a limit string that is not an integer", async () => {
    const res = await request(app)
      .post("/search")
      .send({ query: "tea", limit: "3.5" });

    expect(res.status).toBe(422);
    expect(engine.search).not.toHaveBeenCalled();
  });

  it("POST /add accepts a conversation larger than 100kb", async () => {
    engine.extractAndStore.mockResolvedValue({ results: [] });
    const content = "a".repeat(200_000);

    const res = await request(app)
      .post("/add")
      .send({ messages: [{ role: "user", content }] });

    expect(res.status).toBe(200);
    expect(engine.extractAndStore).toHaveBeenCalledWith(
      [{ role: "user", content }],
      "default_user",
      {}
    );
  });

  it("POST /search rejects a fractional limit", async () => {
    const res = await request(app)
      .post("/search")
      .send({ query: "tea", limit: 2.5 });

    expect(res.status).toBe(422);
  });

  it("GET /all lists a user's memories without scores", async () => {
    engine.listAll.mockResolvedValue([
      { id: "1", memory: "likes tea", score: 0.3 },
    ]);

    const res = await request(app).get("/all").query({ user_id: "alice" });

    expect(res.status).toBe(200);
    expect(engine.listAll).toHaveBeenCalledWith("alice");
    expect(res.body).toEqual({
      success: true,
      count: 1,
      memories: [{ id: "1", memory: "likes tea", metadata: {} }],
    });
  });

  it("GET /all defaults the user id", async () => {
    engine.listAll.mockResolvedValue({ results: [] });

    await request(app).get("/all");

    expect(engine.listAll).toHaveBeenCalledWith("default_user");
  });

  it("DELETE /clear clears one user", async () => {
    engine.deleteAll.mockResolvedValue(undefined);

    const res = await request(app).delete("/clear?user_id=alice");

    expect(res.status).toBe(200);
    expect(engine.deleteAll).toHaveBeenCalledWith("alice");
    expect(res.body).toEqual({
      success: true,
      message: "All memories cleared",
    });
  });

  it("maps engine exceptions to 500 with the engine message", async () => {
    engine.listAll.mockRejectedValue(new Error("collection missing"));

    const res = await request(app).get("/all?user_id=alice");

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ detail: "collection missing" });
  });

  it("answers 400 to malformed JSON", async () => {
    const res = await request(app)
      .post("/add")
      .set("Content-Type", "application/json")
      .send('{"messages": [');

    expect(res.status).toBe(400);
    expect(engine.extractAndStore).not.toHaveBeenCalled();
  });

  describe("when the engine failed to initialize", () => {
    beforeEach(() => {
      app = createApp(unavailableState("invalid api key"));
    });

    it("GET / still answers and reports an error status", async () => {
      const res = await request(app).get("/");

      expect(res.status).toBe(200);
      expect(res.body.status).toBe("error");
    });

    it.each([
      ["get", "/health"],
      ["post", "/add"],
      ["post", "/search"],
      ["get", "/all"],
      ["delete", "/clear"],
    ] as const)("%s %s answers 503", async (method, path) => {
      const res = await request(app)[method](path);

      expect(res.status).toBe(503);
      expect(res.body).toEqual({ detail: "Memory engine not initialized" });
    });

    it("never calls the engine", async () => {
      await request(app).post("/search").send({ query: "tea" });

      expect(engine.search).not.toHaveBeenCalled();
    });
  });
});

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

describe("listen", () => {
  const servers: Server[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map(closeServer));
  });

  it("resolves with a bound server", async () => {
    const server = await listen(
      createApp(unavailableState("not needed")),
      0,
      "127.0.0.1"
    );
    servers.push(server);

    expect(server.listening).toBe(true);
  });

  it("rejects when the port is already taken", async () => {
    const first = await listen(
      createApp(unavailableState("not needed")),
      0,
      "127.0.0.1"
    );
    servers.push(first);
    const address = first.address();
    if (address === null || typeof address === "string") {
      throw new Error("expected a TCP address");
    }

    await expect(
      listen(
        createApp(unavailableState("not needed")),
        address.port,
        "127.0.0.1"
      )
    ).rejects.toThrow("EADDRINUSE");
  });
});

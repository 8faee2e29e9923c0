import { z } from "zod";
import { LLMRouter } from "../src/infrastructure/llm/LLMRouter";
import {
  AllBackendsExhaustedError,
  BackendExhaustedError,
  ConfigurationError,
  TransientBackendError
} from "../src/domain/errors/AgentErrors";
import { silentLogger } from "../src/infrastructure/logging/logger";
import { assistant, httpError, StubBackend, user } from "./helpers/fakes";

describe("LLMRouter", () => {
  let delays: number[];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  const options = () => ({ logger: silentLogger(), sleep });

  beforeEach(() => {
    delays = [];
  });

  it("answers from the primary backend when it succeeds", async () => {
    const a = new StubBackend("a", [assistant("hello")]);
    const b = new StubBackend("b");
    const router = new LLMRouter([a, b], options());

    const reply = await router.call([user("hi")]);

    expect(reply).toEqual(assistant("hello"));
    expect(a.calls).toHaveLength(1);
    expect(b.calls).toHaveLength(0);
    expect(delays).toEqual([]);
  });

  it("retries transient failures on the same backend with exponential backoff", async () => {
    const a = new StubBackend("a", [httpError(503), httpError(429), assistant("ok")]);
    const router = new LLMRouter([a], options());

    await expect(router.call([user("hi")])).resolves.toEqual(assistant("ok"));
    expect(a.calls).toHaveLength(3);
    expect(delays).toEqual([2000, 4000]);
  });

  it("caps the backoff delay", async () => {
    const a = StubBackend.failing("a", () => httpError(503));
    const router = new LLMRouter([a], { ...options(), maxAttempts: 4, baseDelayMs: 2000, maxDelayMs: 3000 });

    await expect(router.call([user("hi")])).rejects.toBeInstanceOf(AllBackendsExhaustedError);
    expect(delays).toEqual([2000, 3000, 3000]);
  });

  it("tries every backend three times before giving up", async () => {
    const a = StubBackend.failing("a", () => new TransientBackendError("a", "overloaded"));
    const b = StubBackend.failing("b", () => httpError(500));
    const c = StubBackend.failing("c", () => new Error("socket hang up"));
    const router = new LLMRouter([a, b, c], options());

    const error = await router.call([user("hi")]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AllBackendsExhaustedError);
    expect(error).toMatchObject({
      message: "All model backends exhausted: a, b, c",
      attempted: ["a", "b", "c"]
    });
    expect([a.calls.length, b.calls.length, c.calls.length]).toEqual([3, 3, 3]);
    expect(delays).toEqual([2000, 4000, 2000, 4000, 2000, 4000]);
    // three rotations bring the cursor back to the start
    expect(router.current.config.name).toBe("a");
  });

  it("chains the last backend's failure as the cause", async () => {
    const a = StubBackend.failing("a", () => httpError(503));
    const router = new LLMRouter([a], options());

    const error = await router.call([user("hi")]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AllBackendsExhaustedError);
    if (!(error instanceof AllBackendsExhaustedError)) return;
    expect(error.cause).toBeInstanceOf(BackendExhaustedError);
    expect(error.cause).toMatchObject({ backend: "a", attempts: 3 });
  });

  it("does not retry structural failures", async () => {
    const a = StubBackend.failing("a", () => httpError(400, "bad request"));
    const b = new StubBackend("b", [assistant("from b")]);
    const router = new LLMRouter([a, b], options());

    await expect(router.call([user("hi")])).resolves.toEqual(assistant("from b"));
    expect(a.calls).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it("keeps the cursor on the backend that last succeeded", async () => {
    const a = new StubBackend("a", [httpError(401)]);
    const b = new StubBackend("b", [assistant("first"), assistant("second")]);
    const router = new LLMRouter([a, b], options());

    await router.call([user("one")]);
    const reply = await router.call([user("two")]);

    expect(reply).toEqual(assistant("second"));
    expect(router.current.config.name).toBe("b");
    expect(a.calls).toHaveLength(1);
    expect(b.calls).toHaveLength(2);
  });

  it("starts the next call on the backend that answered the last one", async () => {
    const a = new StubBackend("a", [httpError(400)]);
    const b = new StubBackend("b", [httpError(400)]);
    const c = new StubBackend("c", [assistant("from c"), assistant("c again")]);
    const router = new LLMRouter([a, b, c], options());

    await router.call([user("one")]);
    await expect(router.call([user("two")])).resolves.toEqual(assistant("c again"));

    expect([a.calls.length, b.calls.length, c.calls.length]).toEqual([1, 1, 2]);
  });

  it("lets overlapping calls each try every backend once", async () => {
    const a = StubBackend.failing("a", () => httpError(400));
    const b = new StubBackend("b", [assistant("b1"), assistant("b2")]);
    const c = StubBackend.failing("c", () => httpError(400));
    const router = new LLMRouter([a, b, c], options());

    const replies = await Promise.all([router.call([user("one")]), router.call([user("two")])]);

    expect(replies.map(reply => reply.content).sort()).toEqual(["b1", "b2"]);
    expect([a.calls.length, b.calls.length, c.calls.length]).toEqual([2, 2, 0]);
    expect(router.current.config.name).toBe("b");
  });

  it("wraps around to earlier backends", async () => {
    const a = new StubBackend("a", [assistant("a answers")]);
    const b = StubBackend.failing("b", () => httpError(400));
    const router = new LLMRouter([a, b], { ...options(), defaultBackend: "b" });

    await expect(router.call([user("hi")])).resolves.toEqual(assistant("a answers"));
    expect(router.current.config.name).toBe("a");
  });

  it("rebinds the tool set after rotating", async () => {
    const spec = { name: "lookup", description: "Looks things up.", schema: z.object({ q: z.string() }) };
    const a = StubBackend.failing("a", () => httpError(400));
    const b = new StubBackend("b", [assistant("done")]);
    const router = new LLMRouter([a, b], options()).bindTools([spec]);

    await router.call([user("hi")]);

    expect(a.calls[0].tools).toEqual([spec]);
    expect(b.calls[0].tools).toEqual([spec]);
    expect(b.bindings.at(-1)).toEqual([spec]);
  });

  it("orders backends by priority", () => {
    const late = new StubBackend("late", [], 2);
    const early = new StubBackend("early", [], 0);
    const router = new LLMRouter([late, early], options());

    expect(router.backendNames).toEqual(["early", "late"]);
    expect(router.current.config.name).toBe("early");
  });

  it("starts on the configured default backend", () => {
    const router = new LLMRouter([new StubBackend("a"), new StubBackend("b")], {
      ...options(),
      defaultBackend: "b"
    });

    expect(router.current.config.name).toBe("b");
  });

  it("falls back to the first backend for an unknown default", () => {
    const router = new LLMRouter([new StubBackend("a"), new StubBackend("b")], {
      ...options(),
      defaultBackend: "missing"
    });

    expect(router.current.config.name).toBe("a");
  });

  it("counts tokens with the current backend", () => {
    const router = new LLMRouter([new StubBackend("a")], options());

    expect(router.countTokens([user("four")])).toBe(4);
  });

  it("refuses an empty backend list", () => {
    expect(() => new LLMRouter([], options())).toThrow(ConfigurationError);
  });
});

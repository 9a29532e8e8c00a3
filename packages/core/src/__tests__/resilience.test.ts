import { describe, it, expect } from "vitest";
import { AccessDeniedError, NetworkError, RateLimitError } from "../errors";
import { CircuitBreaker } from "../services/resilience/circuit-breaker";
import { ProviderGate } from "../services/resilience/provider-gate";
import { ProviderRegistry } from "../services/resilience/provider-registry";
import { computeBackoff, retryBudgetMs, withRetry } from "../services/resilience/retry";
import { TokenBucket } from "../services/resilience/token-bucket";
import { InMemoryMemoryRepository } from "../services/memory/in-memory-repository";
import { ManualClock, StubSearchProvider, result } from "./helpers";

const CIRCUIT = { failureThreshold: 5, cooldownMs: 30_000, maxCooldownMs: 300_000 };

describe("TokenBucket", () => {
  it("should space calls one second apart at one request per second", async () => {
    const clock = new ManualClock();
    const bucket = new TokenBucket(1, clock);

    await Promise.all([bucket.acquire(), bucket.acquire(), bucket.acquire()]);

    expect(clock.sleeps).toEqual([1000, 1000]);
  });

  it("should allow a burst up to its capacity", async () => {
    const clock = new ManualClock();
    const bucket = new TokenBucket(3, clock);

    await Promise.all([bucket.acquire(), bucket.acquire(), bucket.acquire()]);

    expect(clock.sleeps).toEqual([]);
  });

  it("should reject a non-positive rate", () => {
    expect(() => new TokenBucket(0)).toThrow(RangeError);
  });
});

describe("computeBackoff", () => {
  const options = { baseDelayMs: 4000, maxDelayMs: 60_000, jitter: 0.2 };

  it("should double the delay per attempt without jitter at the midpoint", () => {
    const delays = [1, 2, 3, 4].map((attempt) => computeBackoff(attempt, options, () => 0.5));
    expect(delays).toEqual([4000, 8000, 16_000, 32_000]);
  });

  it("should cap the delay at maxDelayMs", () => {
    expect(computeBackoff(5, options, () => 0.5)).toBe(60_000);
  });

  it("should spread the delay by the jitter fraction", () => {
    expect(computeBackoff(1, options, () => 0)).toBe(3200);
    expect(computeBackoff(1, options, () => 1)).toBe(4800);
  });
});

describe("withRetry", () => {
  it("should wait at least the server's Retry-After", async () => {
    const clock = new ManualClock();
    let calls = 0;

    const value = await withRetry(
      async () => {
        calls++;
        if (calls === 1) throw new RateLimitError("slow down", { retryAfterMs: 10_000 });
        return "ok";
      },
      { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 8000, jitter: 0, clock }
    );

    expect(value).toBe("ok");
    expect(clock.sleeps).toEqual([10_000]);
  });

  it("should not retry a non-retryable error", async () => {
    const clock = new ManualClock();
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls++;
          throw new AccessDeniedError("forbidden", { status: 403 });
        },
        { maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 8000, jitter: 0, clock }
      )
    ).rejects.toBeInstanceOf(AccessDeniedError);
    expect(calls).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("should give up after maxAttempts", async () => {
    const clock = new ManualClock();
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls++;
          throw new NetworkError("reset", { retryable: true });
        },
        { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitter: 0, clock }
      )
    ).rejects.toThrow("reset");
    expect(calls).toBe(3);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it("should stop retrying once its signal aborts", async () => {
    const clock = new ManualClock();
    const controller = new AbortController();
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls++;
          controller.abort(new Error("deadline passed"));
          throw new NetworkError("reset", { retryable: true });
        },
        { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitter: 0, clock, signal: controller.signal }
      )
    ).rejects.toThrow("reset");
    expect(calls).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });
});

describe("retryBudgetMs", () => {
  it("should add every attempt timeout to the widest backoff between attempts", () => {
    expect(
      retryBudgetMs(1000, { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitter: 0.5 })
    ).toBe(3450);
  });
});

describe("CircuitBreaker", () => {
  function failTimes(breaker: CircuitBreaker, times: number) {
    for (let i = 0; i < times; i++) {
      const admission = breaker.tryAcquire();
      if (admission) breaker.recordFailure(admission);
    }
  }

  it("should open after the failure threshold", () => {
    const breaker = new CircuitBreaker("pubmed", CIRCUIT, new ManualClock());
    failTimes(breaker, 4);
    expect(breaker.snapshot().state).toBe("closed");

    failTimes(breaker, 1);
    expect(breaker.snapshot().state).toBe("open");
    expect(breaker.tryAcquire()).toBeNull();
  });

  it("should reset the failure count on success while closed", () => {
    const breaker = new CircuitBreaker("pubmed", CIRCUIT, new ManualClock());
    failTimes(breaker, 4);
    const admission = breaker.tryAcquire();
    expect(admission).not.toBeNull();
    if (admission) breaker.recordSuccess(admission);

    expect(breaker.snapshot().consecutiveFailures).toBe(0);
  });

  it("should admit exactly one trial call once the cooldown has passed", () => {
    const clock = new ManualClock();
    const breaker = new CircuitBreaker("pubmed", CIRCUIT, clock);
    failTimes(breaker, 5);

    clock.advance(29_999);
    expect(breaker.tryAcquire()).toBeNull();

    clock.advance(1);
    expect(breaker.tryAcquire()).toEqual({ trial: true });
    expect(breaker.snapshot().state).toBe("half-open");
    expect(breaker.tryAcquire()).toBeNull();
  });

  it("should double the cooldown when the trial fails", () => {
    const clock = new ManualClock();
    const breaker = new CircuitBreaker("pubmed", CIRCUIT, clock);
    failTimes(breaker, 5);
    clock.advance(30_000);

    const trial = breaker.tryAcquire();
    expect(trial).not.toBeNull();
    if (trial) breaker.recordFailure(trial);

    expect(breaker.snapshot()).toEqual({
      state: "open",
      consecutiveFailures: 5,
      cooldownMs: 60_000,
      cooldownUntil: clock.now() + 60_000,
    });
  });

  it("should close and reset the cooldown after a successful trial", () => {
    const clock = new ManualClock();
    const breaker = new CircuitBreaker("pubmed", CIRCUIT, clock);
    failTimes(breaker, 5);
    clock.advance(30_000);
    const first = breaker.tryAcquire();
    if (first) breaker.recordFailure(first);
    clock.advance(60_000);

    const trial = breaker.tryAcquire();
    expect(trial).toEqual({ trial: true });
    if (trial) breaker.recordSuccess(trial);

    expect(breaker.snapshot()).toEqual({
      state: "closed",
      consecutiveFailures: 0,
      cooldownMs: 30_000,
      cooldownUntil: null,
    });
  });

  it("should ignore late outcomes from calls admitted before opening", () => {
    const breaker = new CircuitBreaker("pubmed", CIRCUIT, new ManualClock());
    const early = breaker.tryAcquire();
    failTimes(breaker, 5);

    if (early) breaker.recordSuccess(early);

    expect(breaker.snapshot().state).toBe("open");
  });
});

describe("ProviderGate", () => {
  const gateOptions = (clock: ManualClock) => ({
    requestsPerSecond: 10,
    attemptTimeoutMs: 1000,
    retry: { maxAttempts: 1, baseDelayMs: 100, maxDelayMs: 1000, jitter: 0 },
    clock,
    random: () => 0.5,
  });

  it("should skip the provider while its circuit is open and let one call through after cooldown", async () => {
    const clock = new ManualClock();
    const provider = new StubSearchProvider("semantic_scholar", () => {
      throw new NetworkError("unreachable", { retryable: true });
    });
    const gate = new ProviderGate(provider, new ProviderRegistry(CIRCUIT, clock), gateOptions(clock));

    for (let i = 0; i < 5; i++) {
      expect(await gate.search("query", 5)).toEqual([]);
    }
    expect(provider.calls).toBe(5);

    expect(await gate.search("query", 5)).toEqual([]);
    expect(provider.calls).toBe(5);

    clock.advance(30_000);
    await Promise.all([gate.search("query", 5), gate.search("query", 5)]);
    expect(provider.calls).toBe(6);
  });

  it("should retry a rate-limited call after Retry-After and trim to the limit", async () => {
    const clock = new ManualClock();
    const provider = new StubSearchProvider("pubmed", (_query, call) => {
      if (call === 1) throw new RateLimitError("429", { retryAfterMs: 2000 });
      return [result("https://a.example/1"), result("https://a.example/2"), result("https://a.example/3")];
    });
    const options = gateOptions(clock);
    const gate = new ProviderGate(provider, new ProviderRegistry(CIRCUIT, clock), {
      ...options,
      retry: { ...options.retry, maxAttempts: 3 },
    });

    const items = await gate.search("query", 2);

    expect(items.map((item) => item.url)).toEqual(["https://a.example/1", "https://a.example/2"]);
    expect(provider.calls).toBe(2);
    expect(clock.sleeps).toEqual([2000]);
  });

  it("should not call the provider once the caller's deadline has passed", async () => {
    const clock = new ManualClock();
    const provider = new StubSearchProvider("pubmed", () => [result("https://a.example/1")]);
    const gate = new ProviderGate(provider, new ProviderRegistry(CIRCUIT, clock), gateOptions(clock));
    const controller = new AbortController();
    controller.abort(new Error("deadline passed"));

    expect(await gate.search("query", 5, undefined, controller.signal)).toEqual([]);
    expect(provider.calls).toBe(0);
  });

  it("should record a denied API request by endpoint without its query", async () => {
    const clock = new ManualClock();
    const memory = new InMemoryMemoryRepository({ now: () => clock.now() });
    const provider = new StubSearchProvider("semantic_scholar", (query) => {
      throw new AccessDeniedError("forbidden", {
        status: 403,
        url: `https://api.scholar.test/paper/search?query=${query}&api_key=test-secret`,
      });
    });
    const gate = new ProviderGate(provider, new ProviderRegistry(CIRCUIT, clock), {
      ...gateOptions(clock),
      memory,
    });

    await gate.search("relapse", 5);
    await gate.search("remission", 5);

    expect(memory.listAccessFailures()).toEqual([
      {
        url: "https://api.scholar.test/paper/search",
        source: "semantic_scholar",
        errorType: "access_denied",
        message: "forbidden",
        retryCount: 2,
        firstFailedAt: 1_700_000_000_000,
        lastFailedAt: 1_700_000_000_000,
      },
    ]);
  });

  it("should record a denied URL as a permanent access failure", async () => {
    const clock = new ManualClock();
    const memory = new InMemoryMemoryRepository({ now: () => clock.now() });
    const provider = new StubSearchProvider("brave", () => {
      throw new AccessDeniedError("gone", { status: 404, url: "https://gone.example/page" });
    });
    const gate = new ProviderGate(provider, new ProviderRegistry(CIRCUIT, clock), {
      ...gateOptions(clock),
      memory,
    });

    expect(await gate.search("query", 5)).toEqual([]);
    expect(await memory.isKnownFailure("https://gone.example/page/")).toBe(true);
    expect(memory.listAccessFailures()[0]).toMatchObject({
      source: "brave",
      errorType: "not_found",
      retryCount: 1,
    });
  });
});

import { afterEach, describe, expect, it, vi } from "vitest";
import { TierScheduler } from "../TierScheduler";
import { ConversationStateTracker } from "../ConversationStateTracker";
import { ContextualReframer } from "../../agents/ContextualReframer";
import { StrategicAnalyzer } from "../../agents/StrategicAnalyzer";
import { GenerationServiceError } from "../../utils/error";
import {
  ControlledGenerator,
  FakeGenerationService,
  jsonResponse,
  makeSegment,
  never,
  tier2Suggestion,
} from "../../__tests__/fixtures";
import type { DropReason, SuggestionGenerator, TierResult } from "../../types";

interface Harness {
  state: ConversationStateTracker;
  scheduler: TierScheduler;
  feed(text?: string): void;
  results: Array<{ tier: 2 | 3; result: TierResult }>;
  drops: Array<{ tier: 2 | 3; segmentId: number; reason: DropReason }>;
}

function harness(
  tier2: SuggestionGenerator | null,
  tier3: SuggestionGenerator | null
): Harness {
  const state = new ConversationStateTracker({ windowSize: 20 });
  const scheduler = new TierScheduler({
    tier2: { generator: tier2, budgetMs: 800, maxLag: 1 },
    tier3: { generator: tier3, budgetMs: 2000, maxLag: 3, failureThreshold: 3 },
    takeSnapshot: () => state.snapshot(),
    currentGeneration: () => state.generation,
  });
  const results: Harness["results"] = [];
  const drops: Harness["drops"] = [];
  scheduler.on("result", (result, tier) => results.push({ tier, result }));
  scheduler.on("dropped", (info) => drops.push(info));

  let segmentId = 0;
  return {
    state,
    scheduler,
    results,
    drops,
    feed(text = "Tell me more about that.") {
      const segment = makeSegment({ segmentId: ++segmentId, text });
      state.update(segment);
      scheduler.onFinalSegment(segment);
    },
  };
}

const suggestionResult = (): TierResult => ({
  suggestion: tier2Suggestion(),
  meddicUpdates: [],
});

const modelReply = {
  suggestion: { text: "Label it: sounds like timing is the real worry.", category: "reframe" },
  meddicUpdates: [],
};

describe("TierScheduler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("dispatches Tier 2 for every final segment", () => {
    const tier2 = new ControlledGenerator(2);
    const { feed } = harness(tier2, null);

    feed();
    feed();
    feed();

    expect(tier2.calls.map((call) => call.segment.segmentId)).toEqual([1, 2, 3]);
    expect(tier2.calls.map((call) => call.budgetMs)).toEqual([800, 800, 800]);
  });

  it("keeps one Tier 3 in flight and coalesces to the latest segment", async () => {
    const tier3 = new ControlledGenerator(3);
    const { feed, scheduler } = harness(null, tier3);

    feed();
    feed();
    feed();

    expect(tier3.calls).toHaveLength(1);
    expect(scheduler.inFlightCount(3)).toBe(1);
    expect(scheduler.hasPendingTier3).toBe(true);

    tier3.calls[0].resolve(null);

    await vi.waitFor(() => expect(tier3.calls).toHaveLength(2));
    expect(scheduler.inFlightCount(3)).toBe(1);
    expect(scheduler.hasPendingTier3).toBe(false);
    expect(tier3.last?.segment.segmentId).toBe(3);
    // snapshot taken when the slot freed up, not when segment 2 arrived
    expect(tier3.last?.snapshot.generation).toBe(3);
  });

  it("takes each snapshot after the state update for its segment", () => {
    const tier2 = new ControlledGenerator(2);
    const { feed } = harness(tier2, null);

    feed("first");
    feed("second");

    const snapshot = tier2.last?.snapshot;
    expect(snapshot?.generation).toBe(2);
    expect(snapshot?.window.map((segment) => segment.text)).toEqual(["first", "second"]);
  });

  it("delivers fresh results", async () => {
    const tier2 = new ControlledGenerator(2);
    const { feed, scheduler, results } = harness(tier2, null);

    feed();
    tier2.calls[0].resolve(suggestionResult());
    await scheduler.whenIdle();

    expect(results).toHaveLength(1);
    expect(results[0].tier).toBe(2);
    expect(scheduler.getStats()[2]).toMatchObject({ dispatched: 1, delivered: 1 });
  });

  it("drops results once the conversation has moved past the lag allowance", async () => {
    const tier2 = new ControlledGenerator(2);
    const { feed, state, scheduler, results, drops } = harness(tier2, null);

    feed();
    state.update(makeSegment({ segmentId: 10 }));
    state.update(makeSegment({ segmentId: 11 }));
    tier2.calls[0].resolve(suggestionResult());
    await scheduler.whenIdle();

    expect(results).toEqual([]);
    expect(drops).toEqual([{ tier: 2, segmentId: 1, reason: "stale" }]);
  });

  it("aborts tasks that have fallen behind when new speech arrives", async () => {
    const tier2 = new ControlledGenerator(2);
    const { feed, scheduler, drops } = harness(tier2, null);

    feed();
    feed();
    expect(tier2.calls[0].signal?.aborted).toBe(false);

    feed();
    expect(tier2.calls[0].signal?.aborted).toBe(true);
    expect(tier2.calls[1].signal?.aborted).toBe(false);

    await vi.waitFor(() =>
      expect(drops).toEqual([{ tier: 2, segmentId: 1, reason: "cancelled" }])
    );
    expect(scheduler.getStats()[2].cancelled).toBe(1);
  });

  it("counts empty results separately", async () => {
    const tier2 = new ControlledGenerator(2);
    const { feed, scheduler, drops } = harness(tier2, null);

    feed();
    tier2.calls[0].resolve({ suggestion: null, meddicUpdates: [] });
    await scheduler.whenIdle();

    expect(drops).toEqual([{ tier: 2, segmentId: 1, reason: "empty" }]);
  });

  it("treats a Tier 3 deadline as no suggestion and dispatches afresh on the next segment", async () => {
    vi.useFakeTimers();
    const service = new FakeGenerationService(() => never());
    const { feed, scheduler, results, drops } = harness(
      null,
      new StrategicAnalyzer({ service })
    );

    feed();
    await vi.advanceTimersByTimeAsync(1999);
    expect(drops).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    await scheduler.whenIdle();
    expect(drops).toEqual([{ tier: 3, segmentId: 1, reason: "timeout" }]);
    expect(results).toEqual([]);
    expect(scheduler.inFlightCount(3)).toBe(0);

    feed();
    expect(service.requests).toHaveLength(2);
    expect(scheduler.inFlightCount(3)).toBe(1);
  });

  it("frees the Tier 3 slot on the deadline even when the generator ignores it", async () => {
    vi.useFakeTimers();
    const signals: Array<AbortSignal | undefined> = [];
    const stuck: SuggestionGenerator = {
      tier: 3,
      generate(_segment, _snapshot, _budgetMs, signal) {
        signals.push(signal);
        return new Promise<TierResult | null>(() => undefined);
      },
    };
    const { feed, scheduler, drops } = harness(null, stuck);

    feed();
    await vi.advanceTimersByTimeAsync(2000);
    await scheduler.whenIdle();

    expect(drops).toEqual([{ tier: 3, segmentId: 1, reason: "timeout" }]);
    expect(scheduler.inFlightCount(3)).toBe(0);
    expect(signals[0]?.aborted).toBe(true);

    feed();
    expect(signals).toHaveLength(2);
    expect(scheduler.inFlightCount(3)).toBe(1);
  });

  it("does not count timeouts toward the Tier 3 breaker", async () => {
    vi.useFakeTimers();
    const service = new FakeGenerationService(() => never());
    const { feed, scheduler } = harness(null, new StrategicAnalyzer({ service }));

    for (let i = 0; i < 4; i++) {
      feed();
      await vi.advanceTimersByTimeAsync(2000);
      await scheduler.whenIdle();
    }

    expect(scheduler.isTier3Disabled).toBe(false);
    expect(scheduler.getStats()[3].timeouts).toBe(4);
  });

  it("disables Tier 3 after three consecutive service errors while Tier 2 keeps going", async () => {
    const tier3Service = new FakeGenerationService(() =>
      Promise.reject(new GenerationServiceError("upstream 503", { component: "test" }))
    );
    const tier2Service = new FakeGenerationService(() => jsonResponse(modelReply));
    const { feed, scheduler, results } = harness(
      new ContextualReframer({ service: tier2Service, contextTurns: 4 }),
      new StrategicAnalyzer({ service: tier3Service })
    );
    const disabled = vi.fn();
    scheduler.on("tier3Disabled", disabled);

    for (let i = 0; i < 3; i++) {
      feed();
      await scheduler.whenIdle();
    }
    expect(disabled).toHaveBeenCalledTimes(1);
    expect(disabled).toHaveBeenCalledWith(3);

    feed();
    await scheduler.whenIdle();

    expect(tier3Service.requests).toHaveLength(3);
    expect(tier2Service.requests).toHaveLength(4);
    expect(results.map((r) => r.tier)).toEqual([2, 2, 2, 2]);
    expect(scheduler.isTier3Disabled).toBe(true);
    expect(disabled).toHaveBeenCalledTimes(1);
  });

  it("resets the breaker after a successful Tier 3 call", async () => {
    const outcomes = ["fail", "fail", "ok", "fail", "fail"];
    const service = new FakeGenerationService(() =>
      outcomes.shift() === "ok"
        ? jsonResponse(modelReply)
        : Promise.reject(new GenerationServiceError("upstream 503", { component: "test" }))
    );
    const { feed, scheduler } = harness(null, new StrategicAnalyzer({ service }));

    for (let i = 0; i < 5; i++) {
      feed();
      await scheduler.whenIdle();
    }

    expect(scheduler.isTier3Disabled).toBe(false);
    expect(scheduler.getStats()[3]).toMatchObject({ dispatched: 5, delivered: 1, errors: 4 });
  });

  it("cancels everything and stops dispatching once stopped", async () => {
    const tier2 = new ControlledGenerator(2);
    const tier3 = new ControlledGenerator(3);
    const { feed, scheduler, drops } = harness(tier2, tier3);

    feed();
    feed();
    scheduler.stop();
    await scheduler.whenIdle();

    expect(drops.map((d) => `${d.tier}:${d.segmentId}:${d.reason}`).sort()).toEqual([
      "2:1:cancelled",
      "2:2:cancelled",
      "3:1:cancelled",
    ]);

    feed();
    expect(tier2.calls).toHaveLength(2);
    expect(tier3.calls).toHaveLength(1);
  });
});

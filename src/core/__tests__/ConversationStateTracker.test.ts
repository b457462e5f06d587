import { describe, expect, it, vi } from "vitest";
import { ConversationStateTracker } from "../ConversationStateTracker";
import { PatternMatcher } from "../PatternMatcher";
import { InputError } from "../../utils/error";
import { EMPTY_BRIEF } from "../../utils/stateUtils";
import { makeSegment } from "../../__tests__/fixtures";
import type { MeddicProgress } from "../../types";

function tracker(windowSize = 3) {
  return new ConversationStateTracker({ windowSize, now: () => 500 });
}

describe("ConversationStateTracker", () => {
  it("keeps the last N final segments and bumps the generation per segment", () => {
    const state = tracker(3);

    for (let id = 1; id <= 5; id++) {
      expect(state.update(makeSegment({ segmentId: id, text: `turn ${id}` }))).toBe(true);
    }

    expect(state.generation).toBe(5);
    expect(state.windowLength).toBe(3);
    expect(state.recentTexts()).toEqual(["turn 3", "turn 4", "turn 5"]);
    expect(state.recentTexts(2)).toEqual(["turn 4", "turn 5"]);
  });

  it("rejects interim segments", () => {
    const state = tracker();

    expect(() => state.update(makeSegment({ isFinal: false }))).toThrow(InputError);
    expect(state.generation).toBe(0);
  });

  it("ignores repeated and out-of-order segment ids", () => {
    const state = tracker();
    state.update(makeSegment({ segmentId: 4 }));

    expect(state.update(makeSegment({ segmentId: 4 }))).toBe(false);
    expect(state.update(makeSegment({ segmentId: 2 }))).toBe(false);
    expect(state.generation).toBe(1);
  });

  it("reaches 100% after six segments covering distinct MEDDIC fields and never regresses", () => {
    const state = tracker(20);
    const matcher = new PatternMatcher();
    const statements = [
      "It eats 10 hours a week for the ops team.",
      "Our CFO has the final say on tooling.",
      "Our requirements are SSO and audit logs.",
      "Anything new goes through a security review.",
      "We're frustrated with manual routing.",
      "I'll push for this internally.",
    ];
    const completions: number[] = [];

    statements.forEach((text, index) => {
      const segment = makeSegment({ segmentId: index + 1, text });
      state.update(segment);
      const fields = matcher.addressedFields(segment);
      expect(fields).toHaveLength(1);
      state.applyFieldUpdates(fields.map((field) => ({ field, note: text, source: "pattern" as const })));
      completions.push(state.meddicCompletion());
    });

    expect(completions).toEqual([16, 33, 50, 66, 83, 100]);
    expect(state.meddicGaps()).toEqual([]);

    state.update(makeSegment({ segmentId: 7, text: "Anyway, back to the demo." }));
    state.applyFieldUpdates([]);
    expect(state.meddicCompletion()).toBe(100);
  });

  it("records notes once and only reports newly completed fields", () => {
    const state = tracker();
    const listener = vi.fn<(progress: MeddicProgress) => void>();
    state.on("meddicUpdated", listener);

    expect(
      state.applyFieldUpdates([{ field: "pain", note: "Manual routing", source: "tier2" }])
    ).toEqual(["pain"]);
    expect(
      state.applyFieldUpdates([{ field: "pain", note: " Manual routing ", source: "tier3" }])
    ).toEqual([]);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(state.meddicProgress()).toMatchObject({
      completed: 1,
      total: 6,
      percentage: 16,
      notes: { pain: ["Manual routing"] },
    });
  });

  it("seeds MEDDIC from the pre-call brief", () => {
    const state = new ConversationStateTracker(
      { windowSize: 5 },
      {
        ...EMPTY_BRIEF,
        meddic: { champion: { complete: true, notes: ["Ops lead asked for the call"] } },
      }
    );

    expect(state.meddicProgress().fields.champion).toBe(true);
    expect(state.meddicGaps()).toEqual([
      "metrics",
      "economic_buyer",
      "decision_criteria",
      "decision_process",
      "pain",
    ]);
  });

  it("hands out frozen snapshots unaffected by later updates", () => {
    const state = tracker();
    state.update(makeSegment({ segmentId: 1, text: "first" }));

    const snapshot = state.snapshot();
    state.update(makeSegment({ segmentId: 2, text: "second" }));
    state.applyFieldUpdates([{ field: "metrics", note: null, source: "pattern" }]);

    expect(snapshot.generation).toBe(1);
    expect(snapshot.window.map((segment) => segment.text)).toEqual(["first"]);
    expect(snapshot.meddic.metrics.complete).toBe(false);
    expect(snapshot.takenAt).toBe(500);
    expect(Object.isFrozen(snapshot.meddic.metrics)).toBe(true);
    expect(Object.isFrozen(snapshot.window)).toBe(true);
  });

  it("emits stage changes only when the stage moves", () => {
    const state = tracker();
    const listener = vi.fn();
    state.on("stageChanged", listener);

    expect(state.setStage("discovery")).toBe(false);
    expect(state.setStage("demo")).toBe(true);
    expect(state.setStage("demo")).toBe(false);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith("demo");
    expect(state.stage).toBe("demo");
  });
});

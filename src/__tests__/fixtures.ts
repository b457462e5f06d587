import { DEFAULT_COACH_CONFIG, type CoachConfig } from "../config";
import type {
  GenerationRequest,
  GenerationService,
} from "../services/generation/GenerationService";
import { createMeddicMap, EMPTY_BRIEF } from "../utils/stateUtils";
import type {
  ConversationSnapshot,
  PatternSuggestion,
  ReframeSuggestion,
  StrategicSuggestion,
  SuggestionGenerator,
  TierResult,
  TranscriptSegment,
} from "../types";

export function makeSegment(overrides: Partial<TranscriptSegment> = {}): TranscriptSegment {
  return {
    segmentId: 1,
    speaker: "counterpart",
    text: "We mostly track this in spreadsheets today.",
    isFinal: true,
    receivedAt: 0,
    spokenAt: null,
    streamOffsetMs: null,
    ...overrides,
  };
}

export function makeSnapshot(overrides: Partial<ConversationSnapshot> = {}): ConversationSnapshot {
  return {
    generation: 1,
    window: [makeSegment()],
    meddic: createMeddicMap(),
    stage: "discovery",
    brief: EMPTY_BRIEF,
    takenAt: 0,
    ...overrides,
  };
}

const base = {
  segmentId: 1,
  category: "objection" as const,
  urgency: "high" as const,
  confidence: 0.9,
  text: "Qualify before quoting a price.",
  framework: null,
  createdAt: 1000,
};

export function tier1Suggestion(overrides: Partial<PatternSuggestion> = {}): PatternSuggestion {
  return {
    ...base,
    suggestionId: "t1",
    sourceTier: 1,
    patternId: "pricing-objection",
    triggerPhrase: "pricing question",
    ...overrides,
  };
}

export function tier2Suggestion(overrides: Partial<ReframeSuggestion> = {}): ReframeSuggestion {
  return {
    ...base,
    suggestionId: "t2",
    sourceTier: 2,
    text: "Ask what budget range they had in mind.",
    rationale: null,
    ...overrides,
  };
}

export function tier3Suggestion(overrides: Partial<StrategicSuggestion> = {}): StrategicSuggestion {
  return {
    ...base,
    suggestionId: "t3",
    sourceTier: 3,
    text: "Tie the price back to the hours lost each week.",
    rationale: null,
    ...overrides,
  };
}

export const TEST_CONFIG: CoachConfig = {
  ...DEFAULT_COACH_CONFIG,
  tier2: { ...DEFAULT_COACH_CONFIG.tier2 },
  tier3: { ...DEFAULT_COACH_CONFIG.tier3 },
};

export interface PendingCall {
  segment: TranscriptSegment;
  snapshot: ConversationSnapshot;
  budgetMs: number;
  signal: AbortSignal | undefined;
  resolve(result: TierResult | null): void;
  reject(error: unknown): void;
}

// Settled by hand from the test; rejects with the abort reason when aborted
export class ControlledGenerator implements SuggestionGenerator {
  readonly calls: PendingCall[] = [];

  constructor(readonly tier: 2 | 3) {}

  generate(
    segment: TranscriptSegment,
    snapshot: ConversationSnapshot,
    budgetMs: number,
    signal?: AbortSignal
  ): Promise<TierResult | null> {
    return new Promise((resolve, reject) => {
      this.calls.push({ segment, snapshot, budgetMs, signal, resolve, reject });
      signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
    });
  }

  get last(): PendingCall | undefined {
    return this.calls[this.calls.length - 1];
  }
}

// Answers every request through `respond`
export class FakeGenerationService implements GenerationService {
  readonly requests: GenerationRequest[] = [];

  constructor(
    private readonly respond: (request: GenerationRequest, signal: AbortSignal) => Promise<string>
  ) {}

  generate(request: GenerationRequest, signal: AbortSignal): Promise<string> {
    this.requests.push(request);
    return this.respond(request, signal);
  }
}

export function jsonResponse(body: unknown): Promise<string> {
  return Promise.resolve(JSON.stringify(body));
}

export function never(): Promise<string> {
  return new Promise<string>(() => undefined);
}

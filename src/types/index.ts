// Speakers
export type Speaker = "self" | "counterpart" | "unknown";

// Transcript types
export interface TranscriptSegment {
  readonly segmentId: number;
  readonly speaker: Speaker;
  readonly text: string;
  readonly isFinal: boolean;
  readonly receivedAt: number; // monotonic, ms
  readonly spokenAt: Date | null; // provider timestamp, when it was a wall-clock time
  readonly streamOffsetMs: number | null; // provider timestamp, when it was a stream offset
}

// MEDDIC
export type MeddicField =
  | "metrics"
  | "economic_buyer"
  | "decision_criteria"
  | "decision_process"
  | "pain"
  | "champion";

export const MEDDIC_FIELDS: readonly MeddicField[] = [
  "metrics",
  "economic_buyer",
  "decision_criteria",
  "decision_process",
  "pain",
  "champion",
];

export const MEDDIC_LABELS: Record<MeddicField, string> = {
  metrics: "Metrics",
  economic_buyer: "Economic Buyer",
  decision_criteria: "Decision Criteria",
  decision_process: "Decision Process",
  pain: "Identify Pain",
  champion: "Champion",
};

export interface MeddicFieldState {
  complete: boolean;
  notes: string[];
}

export type MeddicMap = Record<MeddicField, MeddicFieldState>;

export type MeddicUpdateSource = "pattern" | "tier2" | "tier3";

export interface MeddicFieldUpdate {
  field: MeddicField;
  note: string | null;
  source: MeddicUpdateSource;
}

export interface MeddicProgress {
  fields: Record<MeddicField, boolean>;
  notes: Record<MeddicField, string[]>;
  completed: number;
  total: number;
  percentage: number;
}

export type SalesStage = "discovery" | "demo" | "negotiation" | "close";

// Pre-call brief
export interface PreCallBrief {
  prospect: {
    name: string;
    company: string;
    role: string | null;
  };
  currentSolution: string | null;
  meddic: Partial<Record<MeddicField, { complete: boolean; notes: string[] }>>;
  anticipatedObjections: string[];
  notes: string | null;
}

// Conversation state
export interface ConversationSnapshot {
  readonly generation: number;
  readonly window: readonly TranscriptSegment[];
  readonly meddic: Readonly<Record<MeddicField, Readonly<MeddicFieldState>>>;
  readonly stage: SalesStage;
  readonly brief: PreCallBrief;
  readonly takenAt: number;
}

// Suggestions
export type SourceTier = 1 | 2 | 3;

export type SuggestionCategory =
  | "objection"
  | "buying_signal"
  | "stall"
  | "closing"
  | "discovery"
  | "reframe";

export type Urgency = "high" | "medium" | "low";

interface SuggestionBase {
  readonly suggestionId: string;
  readonly segmentId: number;
  readonly category: SuggestionCategory;
  readonly urgency: Urgency;
  readonly confidence: number;
  readonly text: string;
  readonly framework: string | null;
  readonly createdAt: number;
}

export interface PatternSuggestion extends SuggestionBase {
  readonly sourceTier: 1;
  readonly patternId: string;
  readonly triggerPhrase: string;
}

export interface ReframeSuggestion extends SuggestionBase {
  readonly sourceTier: 2;
  readonly rationale: string | null;
}

export interface StrategicSuggestion extends SuggestionBase {
  readonly sourceTier: 3;
  readonly rationale: string | null;
}

export type Suggestion =
  | PatternSuggestion
  | ReframeSuggestion
  | StrategicSuggestion;

export type GeneratedSuggestion = ReframeSuggestion | StrategicSuggestion;

export interface TierResult<S extends GeneratedSuggestion = GeneratedSuggestion> {
  suggestion: S | null;
  meddicUpdates: MeddicFieldUpdate[];
}

export interface SuggestionGenerator<S extends GeneratedSuggestion = GeneratedSuggestion> {
  readonly tier: 2 | 3;
  generate(
    segment: TranscriptSegment,
    snapshot: ConversationSnapshot,
    budgetMs: number,
    signal?: AbortSignal
  ): Promise<TierResult<S> | null>;
}

// Aggregator output
export interface LiveUpdate {
  suggestion: Suggestion;
  supersedes: string | null;
}

export type IngestOutcome =
  | "added"
  | "superseded"
  | "duplicate"
  | "outranked"
  | "acknowledged"
  | "cooldown";

// Delivery
export type OperationalSignal =
  | { kind: "tier3_disabled"; consecutiveFailures: number }
  | { kind: "generation_unavailable" };

export type DeliveryEvent =
  | { type: "suggestion"; update: LiveUpdate }
  | { type: "meddic"; progress: MeddicProgress }
  | { type: "stage"; stage: SalesStage }
  | { type: "operational"; signal: OperationalSignal };

// Event maps
export interface StateEvents {
  meddicUpdated: (progress: MeddicProgress) => void;
  stageChanged: (stage: SalesStage) => void;
}

export interface AggregatorEvents {
  update: (update: LiveUpdate) => void;
  evicted: (suggestion: Suggestion) => void;
}

export type DropReason = "empty" | "timeout" | "error" | "stale" | "cancelled";

export interface SchedulerEvents {
  dispatched: (info: { tier: 2 | 3; segmentId: number; generation: number }) => void;
  result: (result: TierResult, tier: 2 | 3) => void;
  dropped: (info: { tier: 2 | 3; segmentId: number; reason: DropReason }) => void;
  tier3Disabled: (consecutiveFailures: number) => void;
}

export interface TierStats {
  dispatched: number;
  delivered: number;
  empty: number;
  timeouts: number;
  errors: number;
  stale: number;
  cancelled: number;
}

export interface CallSummary {
  callId: string;
  status: "active" | "ended";
  startedAt: string;
  durationMs: number;
  segments: { received: number; final: number; rejected: number };
  suggestionsDelivered: number;
  tiers: { 2: TierStats; 3: TierStats & { disabled: boolean } };
  meddic: MeddicProgress;
  stage: SalesStage;
}

import { formatISO } from "date-fns";
import { v4 as uuidv4 } from "uuid";
import { ContextualReframer } from "../agents/ContextualReframer";
import { StrategicAnalyzer } from "../agents/StrategicAnalyzer";
import type { CoachConfig } from "../config";
import { DeliverySink, type Subscription } from "../services/delivery/DeliverySink";
import type { GenerationService } from "../services/generation/GenerationService";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";
import { SegmentNormalizer } from "../services/transcription/SegmentNormalizer";
import { CoachError, ErrorCodes, ErrorSeverity } from "../utils/error";
import { EMPTY_BRIEF } from "../utils/stateUtils";
import { ConversationStateTracker } from "./ConversationStateTracker";
import { PatternMatcher } from "./PatternMatcher";
import { SuggestionAggregator } from "./SuggestionAggregator";
import { TierScheduler } from "./TierScheduler";
import type {
  CallSummary,
  DeliveryEvent,
  IngestOutcome,
  PreCallBrief,
  Speaker,
  SuggestionGenerator,
  TierResult,
  TranscriptSegment,
} from "../types";

// Turns of recent speech the stage detector looks at
const STAGE_CONTEXT_TURNS = 5;

export interface CoachingSessionOptions {
  config: CoachConfig;
  brief?: PreCallBrief;
  // null runs the call on pattern matching only
  generation?: GenerationService | null;
  // Override the model-backed tiers directly
  tier2?: SuggestionGenerator | null;
  tier3?: SuggestionGenerator | null;
  patternMatcher?: PatternMatcher;
  speakerMap?: Record<string, Speaker>;
  now?: () => number;
}

/**
 * One live call: the single writer of conversation state and the driver of
 * the whole pipeline, from raw transcript payloads to delivery events.
 *
 * Build a fresh session per call; nothing is shared between calls.
 */
export class CoachingSession {
  readonly callId = uuidv4();
  readonly state: ConversationStateTracker;
  readonly aggregator: SuggestionAggregator;
  readonly scheduler: TierScheduler;
  readonly sink: DeliverySink;
  private readonly normalizer: SegmentNormalizer;
  private readonly matcher: PatternMatcher;
  private readonly config: CoachConfig;
  private readonly now: () => number;
  private readonly startedAt: number;
  private endedAt: number | null = null;
  private readonly counts = { received: 0, final: 0, rejected: 0 };
  // Interim segments heard since the last final
  private interimIds: number[] = [];
  readonly degraded: boolean;
  private logger: LoggingService;

  constructor(options: CoachingSessionOptions) {
    const { config } = options;
    this.config = config;
    this.now = options.now ?? (() => Date.now());
    this.startedAt = this.now();
    this.logger = LoggingService.getInstance();

    this.normalizer = new SegmentNormalizer({
      speakerMap: options.speakerMap,
      filterHallucinations: config.filterHallucinations,
    });
    this.matcher = options.patternMatcher ?? new PatternMatcher(undefined, { now: this.now });
    this.state = new ConversationStateTracker(
      { windowSize: config.windowSize, now: this.now },
      options.brief ?? EMPTY_BRIEF
    );
    this.aggregator = new SuggestionAggregator({
      displayWindow: config.displayWindow,
      repeatCooldownMs: config.repeatCooldownMs,
      now: this.now,
    });
    this.sink = new DeliverySink({ capacity: config.subscriberCapacity });

    const service = options.generation ?? null;
    const tier2 =
      options.tier2 !== undefined
        ? options.tier2
        : service &&
          new ContextualReframer({
            service,
            contextTurns: config.tier2.contextTurns,
            now: this.now,
          });
    const tier3 =
      options.tier3 !== undefined
        ? options.tier3
        : service && new StrategicAnalyzer({ service, now: this.now });

    this.degraded = !tier2 && !tier3;
    this.scheduler = new TierScheduler({
      tier2: { generator: tier2, budgetMs: config.tier2.budgetMs, maxLag: config.tier2.maxLag },
      tier3: {
        generator: tier3,
        budgetMs: config.tier3.budgetMs,
        maxLag: config.tier3.maxLag,
        failureThreshold: config.tier3.failureThreshold,
      },
      takeSnapshot: () => this.state.snapshot(),
      currentGeneration: () => this.state.generation,
    });

    this.wireEvents();

    this.logger.log(LogLevel.INFO, "Call started", "CoachingSession", {
      callId: this.callId,
      degraded: this.degraded,
      company: options.brief?.prospect.company ?? null,
    });
  }

  get active(): boolean {
    return this.endedAt === null;
  }

  subscribe(): Subscription {
    const subscription = this.sink.subscribe();
    if (this.degraded) {
      subscription.offer({ type: "operational", signal: { kind: "generation_unavailable" } });
    }
    return subscription;
  }

  /**
   * Feeds one raw provider payload through the pipeline. Returns the
   * normalized segment, or null when the payload was dropped.
   */
  ingest(raw: unknown): TranscriptSegment | null {
    if (!this.active) {
      throw new CoachError("Call has ended", ErrorCodes.CALL_NOT_ACTIVE, ErrorSeverity.LOW, {
        component: "CoachingSession.ingest",
        callId: this.callId,
      });
    }

    this.counts.received++;
    const segment = this.normalizer.normalize(raw);
    if (!segment) {
      this.counts.rejected++;
      return null;
    }

    if (!segment.isFinal) {
      this.interimIds.push(segment.segmentId);
      if (this.config.tier1OnInterim) {
        this.runTier1(segment);
      }
      return segment;
    }

    const interimIds = this.interimIds;
    this.interimIds = [];
    if (!this.state.update(segment)) {
      this.counts.rejected++;
      return null;
    }
    this.counts.final++;
    this.aggregator.linkInterim(segment.segmentId, interimIds);

    const addressed = this.matcher.addressedFields(segment);
    if (addressed.length > 0) {
      this.state.applyFieldUpdates(
        addressed.map((field) => ({ field, note: segment.text, source: "pattern" as const }))
      );
    }

    this.runTier1(segment);
    this.state.setStage(this.matcher.detectStage(this.state.recentTexts(STAGE_CONTEXT_TURNS)));
    this.scheduler.onFinalSegment(segment);
    return segment;
  }

  acknowledge(suggestionId: string): boolean {
    return this.aggregator.acknowledge(suggestionId);
  }

  // Cancels in-flight generation and closes every stream
  end(): CallSummary {
    if (this.active) {
      this.endedAt = this.now();
      this.scheduler.stop("call ended");
      this.aggregator.close();
      this.sink.close();
      this.logger.log(LogLevel.INFO, "Call ended", "CoachingSession", {
        callId: this.callId,
        finalSegments: this.counts.final,
        suggestionsDelivered: this.aggregator.deliveredCount,
        meddicCompletion: this.state.meddicCompletion(),
      });
    }
    return this.summary();
  }

  whenIdle(): Promise<void> {
    return this.scheduler.whenIdle();
  }

  summary(): CallSummary {
    const stats = this.scheduler.getStats();
    return {
      callId: this.callId,
      status: this.active ? "active" : "ended",
      startedAt: formatISO(this.startedAt),
      durationMs: (this.endedAt ?? this.now()) - this.startedAt,
      segments: { ...this.counts },
      suggestionsDelivered: this.aggregator.deliveredCount,
      tiers: {
        2: stats[2],
        3: { ...stats[3], disabled: this.scheduler.isTier3Disabled },
      },
      meddic: this.state.meddicProgress(),
      stage: this.state.stage,
    };
  }

  private runTier1(segment: TranscriptSegment): IngestOutcome | null {
    const suggestion = this.matcher.match(segment, this.state);
    return suggestion ? this.aggregator.ingest(suggestion) : null;
  }

  private applyTierResult(result: TierResult): void {
    if (!this.active) {
      return;
    }
    if (result.meddicUpdates.length > 0) {
      this.state.applyFieldUpdates(result.meddicUpdates);
    }
    if (result.suggestion) {
      this.aggregator.ingest(result.suggestion);
    }
  }

  private publish(event: DeliveryEvent): void {
    this.sink.publish(event);
  }

  private wireEvents(): void {
    this.aggregator.on("update", (update) => this.publish({ type: "suggestion", update }));
    this.state.on("meddicUpdated", (progress) => this.publish({ type: "meddic", progress }));
    this.state.on("stageChanged", (stage) => this.publish({ type: "stage", stage }));
    this.scheduler.on("result", (result, tier) => {
      this.logger.log(LogLevel.DEBUG, "Tier result received", "CoachingSession", {
        tier,
        segmentId: result.suggestion?.segmentId ?? null,
        meddicUpdates: result.meddicUpdates.length,
      });
      this.applyTierResult(result);
    });
    this.scheduler.on("tier3Disabled", (consecutiveFailures) =>
      this.publish({
        type: "operational",
        signal: { kind: "tier3_disabled", consecutiveFailures },
      })
    );
    this.scheduler.on("dispatched", ({ tier, segmentId, generation }) =>
      this.logger.log(LogLevel.DEBUG, "Tier dispatched", "CoachingSession", {
        tier,
        segmentId,
        generation,
      })
    );
    this.scheduler.on("dropped", ({ tier, segmentId, reason }) =>
      this.logger.log(LogLevel.DEBUG, "Tier result dropped", "CoachingSession", {
        tier,
        segmentId,
        reason,
      })
    );
  }
}

import { EventEmitter } from "events";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";
import {
  CoachError,
  GenerationCancelled,
  GenerationServiceError,
  GenerationTimeout,
  StaleResult,
  describeError,
} from "../utils/error";
import { runWithDeadline } from "../utils/deadline";
import type {
  ConversationSnapshot,
  DropReason,
  SchedulerEvents,
  SuggestionGenerator,
  TierResult,
  TierStats,
  TranscriptSegment,
} from "../types";

export interface TierSchedulerOptions {
  tier2: {
    generator: SuggestionGenerator | null;
    budgetMs: number;
    maxLag: number;
  };
  tier3: {
    generator: SuggestionGenerator | null;
    budgetMs: number;
    maxLag: number;
    failureThreshold: number;
  };
  // Snapshots are taken at launch, so a coalesced Tier 3 sees the latest state
  takeSnapshot: () => ConversationSnapshot;
  currentGeneration: () => number;
}

interface Task {
  tier: 2 | 3;
  segmentId: number;
  generation: number;
  controller: AbortController;
}

const emptyStats = (): TierStats => ({
  dispatched: 0,
  delivered: 0,
  empty: 0,
  timeouts: 0,
  errors: 0,
  stale: 0,
  cancelled: 0,
});

/**
 * Fans each final segment out to the model-backed tiers without ever blocking
 * the caller.
 *
 * Tier 2 runs for every final segment. Tier 3 has a single slot: while it is
 * busy only the newest segment waits, and it launches once the slot frees.
 * Results older than a tier's lag allowance are dropped, and tasks that have
 * already fallen that far behind are aborted when new speech arrives.
 * Consecutive Tier 3 service failures past the threshold disable Tier 3 for
 * the rest of the call; timeouts don't count toward it.
 */
export class TierScheduler extends EventEmitter {
  private readonly options: TierSchedulerOptions;
  private readonly inFlight = new Set<Task>();
  private readonly running = new Set<Promise<void>>();
  private tier3Task: Task | null = null;
  private pendingTier3: TranscriptSegment | null = null;
  private consecutiveTier3Failures = 0;
  private tier3Disabled = false;
  private stopped = false;
  private readonly stats: Record<2 | 3, TierStats> = { 2: emptyStats(), 3: emptyStats() };
  private logger: LoggingService;

  constructor(options: TierSchedulerOptions) {
    super();
    this.options = options;
    this.logger = LoggingService.getInstance();
  }

  get isTier3Disabled(): boolean {
    return this.tier3Disabled;
  }

  get hasPendingTier3(): boolean {
    return this.pendingTier3 !== null;
  }

  inFlightCount(tier?: 2 | 3): number {
    let count = 0;
    for (const task of this.inFlight) {
      if (tier === undefined || task.tier === tier) count++;
    }
    return count;
  }

  getStats(): Record<2 | 3, TierStats> {
    return { 2: { ...this.stats[2] }, 3: { ...this.stats[3] } };
  }

  onFinalSegment(segment: TranscriptSegment): void {
    if (this.stopped) {
      return;
    }

    this.cancelStale();

    if (this.options.tier2.generator) {
      this.launch(2, this.options.tier2.generator, segment);
    }

    const tier3 = this.options.tier3.generator;
    if (tier3 && !this.tier3Disabled) {
      if (this.tier3Task) {
        this.pendingTier3 = segment;
      } else {
        this.launch(3, tier3, segment);
      }
    }
  }

  cancelAll(reason: string): void {
    this.pendingTier3 = null;
    for (const task of this.inFlight) {
      this.abort(task, reason);
    }
  }

  stop(reason = "call ended"): void {
    this.stopped = true;
    this.cancelAll(reason);
  }

  // Resolves once nothing is running, including Tier 3 launched from the pending slot
  async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running);
    }
  }

  private cancelStale(): void {
    const current = this.options.currentGeneration();
    for (const task of this.inFlight) {
      if (current - task.generation > this.maxLag(task.tier)) {
        this.abort(task, "superseded by newer speech");
      }
    }
  }

  private abort(task: Task, reason: string): void {
    if (!task.controller.signal.aborted) {
      task.controller.abort(
        new GenerationCancelled(reason, {
          component: "TierScheduler",
          tier: task.tier,
          segmentId: task.segmentId,
        })
      );
    }
  }

  private maxLag(tier: 2 | 3): number {
    return tier === 2 ? this.options.tier2.maxLag : this.options.tier3.maxLag;
  }

  private budget(tier: 2 | 3): number {
    return tier === 2 ? this.options.tier2.budgetMs : this.options.tier3.budgetMs;
  }

  private launch(tier: 2 | 3, generator: SuggestionGenerator, segment: TranscriptSegment): void {
    const snapshot = this.options.takeSnapshot();
    const task: Task = {
      tier,
      segmentId: segment.segmentId,
      generation: snapshot.generation,
      controller: new AbortController(),
    };

    this.inFlight.add(task);
    if (tier === 3) {
      this.tier3Task = task;
    }
    this.stats[tier].dispatched++;
    this.emit("dispatched", { tier, segmentId: segment.segmentId, generation: task.generation });

    const run: Promise<void> = this.run(task, generator, segment, snapshot)
      .catch((error: unknown) => {
        // Only a throwing listener gets here
        this.logger.log(LogLevel.ERROR, "Tier task listener failed", "TierScheduler", {
          tier,
          segmentId: segment.segmentId,
          originalError: describeError(error),
        });
      })
      .finally(() => {
        this.inFlight.delete(task);
        this.running.delete(run);
        if (tier === 3) {
          this.tier3Task = null;
          this.launchPendingTier3();
        }
      });
    this.running.add(run);
  }

  private launchPendingTier3(): void {
    const segment = this.pendingTier3;
    const generator = this.options.tier3.generator;
    this.pendingTier3 = null;
    if (segment && generator && !this.tier3Disabled && !this.stopped) {
      this.launch(3, generator, segment);
    }
  }

  private async run(
    task: Task,
    generator: SuggestionGenerator,
    segment: TranscriptSegment,
    snapshot: ConversationSnapshot
  ): Promise<void> {
    const budgetMs = this.budget(task.tier);
    let result: TierResult | null;
    try {
      // The slot frees on the deadline even when a generator ignores its budget
      result = await runWithDeadline(
        budgetMs,
        () =>
          new GenerationTimeout(task.tier, budgetMs, {
            component: "TierScheduler",
            segmentId: task.segmentId,
          }),
        (signal) => generator.generate(segment, snapshot, budgetMs, signal),
        task.controller.signal
      );
    } catch (error) {
      this.handleFailure(task, error);
      return;
    }

    if (task.tier === 3) {
      this.consecutiveTier3Failures = 0;
    }

    if (task.controller.signal.aborted) {
      this.drop(task, "cancelled");
      return;
    }

    const current = this.options.currentGeneration();
    if (current - task.generation > this.maxLag(task.tier)) {
      const stale = new StaleResult(task.generation, current, {
        component: "TierScheduler",
        tier: task.tier,
        segmentId: task.segmentId,
      });
      this.logger.log(LogLevel.DEBUG, stale.message, "TierScheduler", stale.metadata);
      this.drop(task, "stale");
      return;
    }

    if (!result || (!result.suggestion && result.meddicUpdates.length === 0)) {
      this.drop(task, "empty");
      return;
    }

    this.stats[task.tier].delivered++;
    this.emit("result", result, task.tier);
  }

  private handleFailure(task: Task, error: unknown): void {
    if (error instanceof GenerationCancelled) {
      this.drop(task, "cancelled");
      return;
    }

    if (error instanceof GenerationTimeout) {
      this.logger.log(LogLevel.INFO, error.message, "TierScheduler", {
        segmentId: task.segmentId,
      });
      this.drop(task, "timeout");
      return;
    }

    if (error instanceof GenerationServiceError) {
      this.logger.error(error, "TierScheduler");
      this.drop(task, "error");
      if (task.tier === 3) {
        this.recordTier3Failure();
      }
      return;
    }

    const metadata = {
      tier: task.tier,
      segmentId: task.segmentId,
      originalError: describeError(error),
    };
    if (error instanceof CoachError) {
      this.logger.error(error, "TierScheduler");
    } else {
      this.logger.log(LogLevel.ERROR, "Unexpected generator failure", "TierScheduler", metadata);
    }
    this.drop(task, "error");
  }

  private recordTier3Failure(): void {
    this.consecutiveTier3Failures++;
    if (
      !this.tier3Disabled &&
      this.consecutiveTier3Failures >= this.options.tier3.failureThreshold
    ) {
      this.tier3Disabled = true;
      this.pendingTier3 = null;
      this.logger.log(
        LogLevel.WARN,
        "Tier 3 disabled for the rest of the call",
        "TierScheduler",
        { consecutiveFailures: this.consecutiveTier3Failures }
      );
      this.emit("tier3Disabled", this.consecutiveTier3Failures);
    }
  }

  private drop(task: Task, reason: DropReason): void {
    const stats = this.stats[task.tier];
    switch (reason) {
      case "empty":
        stats.empty++;
        break;
      case "timeout":
        stats.timeouts++;
        break;
      case "error":
        stats.errors++;
        break;
      case "stale":
        stats.stale++;
        break;
      case "cancelled":
        stats.cancelled++;
        break;
    }
    this.emit("dropped", { tier: task.tier, segmentId: task.segmentId, reason });
  }

  public on<K extends keyof SchedulerEvents>(event: K, listener: SchedulerEvents[K]): this {
    return super.on(event, listener);
  }

  public emit<K extends keyof SchedulerEvents>(
    event: K,
    ...args: Parameters<SchedulerEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}

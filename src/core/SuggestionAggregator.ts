import { EventEmitter } from "events";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";
import { BoundedChannel } from "../services/delivery/BoundedChannel";
import type {
  AggregatorEvents,
  IngestOutcome,
  LiveUpdate,
  Suggestion,
} from "../types";

export interface SuggestionAggregatorOptions {
  displayWindow: number;
  repeatCooldownMs: number;
  streamCapacity?: number;
  now?: () => number;
}

interface WindowEntry {
  suggestion: Suggestion;
  sequence: number;
  acknowledged: boolean;
}

/**
 * Merges suggestions from all tiers into the live display window.
 *
 * One card per (segmentId, category): a higher tier replaces a lower one
 * unless the rep already acted on it; a lower or equal tier arriving later is
 * dropped. Ids are idempotent. The window keeps the K newest by createdAt.
 * Once a final segment is linked to the interim segments it completed, their
 * cards count as its own, and the final may replace them at the same tier.
 */
export class SuggestionAggregator extends EventEmitter {
  private window: WindowEntry[] = [];
  private readonly seenIds = new Set<string>();
  private readonly lastShown = new Map<string, number>();
  private readonly interimOf = new Map<number, ReadonlySet<number>>();
  private readonly streams = new Set<BoundedChannel<LiveUpdate>>();
  private sequence = 0;
  private delivered = 0;
  private readonly displayWindow: number;
  private readonly repeatCooldownMs: number;
  private readonly streamCapacity: number;
  private readonly now: () => number;
  private logger: LoggingService;

  constructor(options: SuggestionAggregatorOptions) {
    super();
    if (!Number.isInteger(options.displayWindow) || options.displayWindow < 1) {
      throw new RangeError("displayWindow must be a positive integer");
    }
    this.displayWindow = options.displayWindow;
    this.repeatCooldownMs = options.repeatCooldownMs;
    this.streamCapacity = options.streamCapacity ?? 64;
    this.now = options.now ?? (() => Date.now());
    this.logger = LoggingService.getInstance();
  }

  get deliveredCount(): number {
    return this.delivered;
  }

  ingest(suggestion: Suggestion): IngestOutcome {
    if (this.seenIds.has(suggestion.suggestionId)) {
      return "duplicate";
    }
    this.seenIds.add(suggestion.suggestionId);

    const interimIds = this.interimOf.get(suggestion.segmentId);
    const existing = this.window.find(
      (entry) =>
        entry.suggestion.category === suggestion.category &&
        (entry.suggestion.segmentId === suggestion.segmentId ||
          (interimIds?.has(entry.suggestion.segmentId) ?? false))
    );

    if (existing) {
      const fromInterim = existing.suggestion.segmentId !== suggestion.segmentId;
      const outranked = fromInterim
        ? existing.suggestion.sourceTier > suggestion.sourceTier
        : existing.suggestion.sourceTier >= suggestion.sourceTier;
      if (outranked) {
        this.skip(suggestion, "outranked");
        return "outranked";
      }
      if (existing.acknowledged) {
        this.skip(suggestion, "acknowledged");
        return "acknowledged";
      }
    }

    const repeatKey = `${suggestion.sourceTier}:${suggestion.text.toLowerCase()}`;
    const lastShownAt = this.lastShown.get(repeatKey);
    const now = this.now();
    if (lastShownAt !== undefined && now - lastShownAt < this.repeatCooldownMs) {
      this.skip(suggestion, "cooldown");
      return "cooldown";
    }
    this.lastShown.set(repeatKey, now);

    if (existing) {
      this.window = this.window.filter((entry) => entry !== existing);
    }
    this.window.push({ suggestion, sequence: this.sequence++, acknowledged: false });
    this.window.sort(
      (a, b) =>
        b.suggestion.createdAt - a.suggestion.createdAt || b.sequence - a.sequence
    );

    for (const evicted of this.window.splice(this.displayWindow)) {
      this.emit("evicted", evicted.suggestion);
    }

    const update: LiveUpdate = {
      suggestion,
      supersedes: existing ? existing.suggestion.suggestionId : null,
    };
    this.delivered++;
    this.logger.log(LogLevel.DEBUG, "Suggestion accepted", "SuggestionAggregator", {
      suggestionId: suggestion.suggestionId,
      tier: suggestion.sourceTier,
      segmentId: suggestion.segmentId,
      category: suggestion.category,
      supersedes: update.supersedes,
    });

    this.emit("update", update);
    for (const stream of this.streams) {
      if (stream.isClosed) {
        this.streams.delete(stream);
      } else {
        stream.push(update);
      }
    }
    return existing ? "superseded" : "added";
  }

  linkInterim(finalSegmentId: number, interimSegmentIds: readonly number[]): void {
    if (interimSegmentIds.length > 0) {
      this.interimOf.set(finalSegmentId, new Set(interimSegmentIds));
    }
  }

  // Marks a card as acted upon; it will not be replaced by a later tier
  acknowledge(suggestionId: string): boolean {
    const entry = this.window.find((e) => e.suggestion.suggestionId === suggestionId);
    if (!entry) {
      return false;
    }
    entry.acknowledged = true;
    return true;
  }

  // Newest first
  liveWindow(): Suggestion[] {
    return this.window.map((entry) => entry.suggestion);
  }

  // Future updates only; breaking out of the loop unsubscribes
  stream(): AsyncIterable<LiveUpdate> {
    const channel = new BoundedChannel<LiveUpdate>(this.streamCapacity);
    this.streams.add(channel);
    return channel;
  }

  close(): void {
    for (const stream of this.streams) {
      stream.close();
    }
    this.streams.clear();
  }

  private skip(suggestion: Suggestion, reason: IngestOutcome): void {
    this.logger.log(LogLevel.DEBUG, "Suggestion not shown", "SuggestionAggregator", {
      suggestionId: suggestion.suggestionId,
      tier: suggestion.sourceTier,
      segmentId: suggestion.segmentId,
      reason,
    });
  }

  public on<K extends keyof AggregatorEvents>(event: K, listener: AggregatorEvents[K]): this {
    return super.on(event, listener);
  }

  public emit<K extends keyof AggregatorEvents>(
    event: K,
    ...args: Parameters<AggregatorEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}

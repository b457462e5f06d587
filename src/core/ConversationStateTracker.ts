import { EventEmitter } from "events";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";
import { InputError } from "../utils/error";
import { createMeddicMap, deepFreeze, EMPTY_BRIEF } from "../utils/stateUtils";
import {
  MEDDIC_FIELDS,
  type ConversationSnapshot,
  type MeddicField,
  type MeddicFieldState,
  type MeddicFieldUpdate,
  type MeddicMap,
  type MeddicProgress,
  type PreCallBrief,
  type SalesStage,
  type StateEvents,
  type TranscriptSegment,
} from "../types";

export interface ConversationStateOptions {
  windowSize: number;
  now?: () => number;
}

/**
 * Per-call conversation state: the rolling window of final segments, the
 * MEDDIC map and the generation counter.
 *
 * One writer (the session driving the call). Async readers never see this
 * object, only frozen copies from snapshot().
 */
export class ConversationStateTracker extends EventEmitter {
  private window: TranscriptSegment[] = [];
  private meddicMap: MeddicMap;
  private currentGeneration = 0;
  private currentStage: SalesStage = "discovery";
  private lastSegmentId = 0;
  private readonly brief: PreCallBrief;
  private readonly windowSize: number;
  private readonly now: () => number;
  private logger: LoggingService;

  constructor(options: ConversationStateOptions, brief: PreCallBrief = EMPTY_BRIEF) {
    super();
    if (!Number.isInteger(options.windowSize) || options.windowSize < 1) {
      throw new RangeError("windowSize must be a positive integer");
    }
    this.brief = structuredClone(brief);
    this.meddicMap = createMeddicMap(brief.meddic);
    this.windowSize = options.windowSize;
    this.now = options.now ?? (() => Date.now());
    this.logger = LoggingService.getInstance();
  }

  get generation(): number {
    return this.currentGeneration;
  }

  get stage(): SalesStage {
    return this.currentStage;
  }

  // Live view for the inline Tier 1 path only
  get meddic(): Readonly<Record<MeddicField, Readonly<MeddicFieldState>>> {
    return this.meddicMap;
  }

  get windowLength(): number {
    return this.window.length;
  }

  update(segment: TranscriptSegment): boolean {
    if (!segment.isFinal) {
      throw new InputError("Only final segments update conversation state", {
        component: "ConversationStateTracker.update",
        segmentId: segment.segmentId,
      });
    }

    if (segment.segmentId <= this.lastSegmentId) {
      this.logger.log(
        LogLevel.WARN,
        "Ignoring repeated or out-of-order segment",
        "ConversationStateTracker",
        { segmentId: segment.segmentId, lastSegmentId: this.lastSegmentId }
      );
      return false;
    }

    this.lastSegmentId = segment.segmentId;
    this.window.push(segment);
    if (this.window.length > this.windowSize) {
      this.window.splice(0, this.window.length - this.windowSize);
    }
    this.currentGeneration++;
    return true;
  }

  // Monotonic: fields only ever go incomplete -> complete
  applyFieldUpdates(updates: readonly MeddicFieldUpdate[]): MeddicField[] {
    const completed: MeddicField[] = [];
    let changed = false;

    for (const { field, note } of updates) {
      const state = this.meddicMap[field];
      if (!state.complete) {
        state.complete = true;
        completed.push(field);
        changed = true;
      }
      const trimmed = note?.trim();
      if (trimmed && !state.notes.includes(trimmed)) {
        state.notes.push(trimmed);
        changed = true;
      }
    }

    if (changed) {
      this.emit("meddicUpdated", this.meddicProgress());
    }
    return completed;
  }

  setStage(stage: SalesStage): boolean {
    if (stage === this.currentStage) {
      return false;
    }
    this.currentStage = stage;
    this.emit("stageChanged", stage);
    return true;
  }

  snapshot(): ConversationSnapshot {
    return deepFreeze({
      generation: this.currentGeneration,
      window: structuredClone(this.window),
      meddic: structuredClone(this.meddicMap),
      stage: this.currentStage,
      brief: structuredClone(this.brief),
      takenAt: this.now(),
    });
  }

  recentTexts(count: number = this.windowSize): string[] {
    return this.window.slice(-count).map((segment) => segment.text);
  }

  meddicCompletion(): number {
    const completed = MEDDIC_FIELDS.filter((field) => this.meddicMap[field].complete).length;
    return Math.floor((completed / MEDDIC_FIELDS.length) * 100);
  }

  meddicGaps(): MeddicField[] {
    return MEDDIC_FIELDS.filter((field) => !this.meddicMap[field].complete);
  }

  meddicProgress(): MeddicProgress {
    const fields = this.mapFields((state) => state.complete);
    return {
      fields,
      notes: this.mapFields((state) => [...state.notes]),
      completed: MEDDIC_FIELDS.filter((field) => fields[field]).length,
      total: MEDDIC_FIELDS.length,
      percentage: this.meddicCompletion(),
    };
  }

  private mapFields<T>(fn: (state: MeddicFieldState) => T): Record<MeddicField, T> {
    const map = this.meddicMap;
    return {
      metrics: fn(map.metrics),
      economic_buyer: fn(map.economic_buyer),
      decision_criteria: fn(map.decision_criteria),
      decision_process: fn(map.decision_process),
      pain: fn(map.pain),
      champion: fn(map.champion),
    };
  }

  public on<K extends keyof StateEvents>(event: K, listener: StateEvents[K]): this {
    return super.on(event, listener);
  }

  public emit<K extends keyof StateEvents>(
    event: K,
    ...args: Parameters<StateEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}

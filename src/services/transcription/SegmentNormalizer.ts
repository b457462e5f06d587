import { z } from "zod";
import { fromUnixTime, isValid, parseISO } from "date-fns";
import { LoggingService, LogLevel } from "../logging/LoggingService";
import { ErrorCodes, InputError } from "../../utils/error";
import type { Speaker, TranscriptSegment } from "../../types";

const rawSegmentSchema = z.object({
  text: z.string(),
  speaker: z.union([z.string(), z.number()]).nullish(),
  isFinal: z.boolean().optional(),
  is_final: z.boolean().optional(),
  timestamp: z.union([z.number(), z.string(), z.date()]).nullish(),
});

export type RawTranscriptPayload = z.input<typeof rawSegmentSchema>;

const DEFAULT_SPEAKER_LABELS: Record<string, Speaker> = {
  self: "self",
  you: "self",
  me: "self",
  rep: "self",
  agent: "self",
  seller: "self",
  user: "self",
  counterpart: "counterpart",
  prospect: "counterpart",
  customer: "counterpart",
  buyer: "counterpart",
  client: "counterpart",
  them: "counterpart",
  unknown: "unknown",
};

// Below this a numeric timestamp is an offset into the audio stream, in seconds.
const EPOCH_SECONDS_FLOOR = 1e9;
const EPOCH_MILLIS_FLOOR = 1e12;

export interface SegmentNormalizerOptions {
  // Extra label mapping, e.g. diarization indices { "0": "self", "1": "counterpart" }
  speakerMap?: Record<string, Speaker>;
  filterHallucinations?: boolean;
  now?: () => number;
}

export class SegmentNormalizer {
  private nextSegmentId = 1;
  private readonly speakerLabels: Record<string, Speaker>;
  private readonly filterHallucinations: boolean;
  private readonly now: () => number;
  private logger: LoggingService;

  // Provider hallucinations on silence
  private readonly HALLUCINATION_PATTERNS = [
    /^(thank you|thanks) for watching[.!?]?$/i,
    /^don't forget to subscribe[.!?]?$/i,
    /^see you (in|next)[^.!?]*[.!?]?$/i,
    /^[\s.!?,-]*$/,
  ];

  constructor(options: SegmentNormalizerOptions = {}) {
    this.speakerLabels = { ...DEFAULT_SPEAKER_LABELS };
    for (const [label, speaker] of Object.entries(options.speakerMap ?? {})) {
      this.speakerLabels[this.labelKey(label)] = speaker;
    }
    this.filterHallucinations = options.filterHallucinations ?? true;
    this.now = options.now ?? (() => performance.now());
    this.logger = LoggingService.getInstance();
  }

  // Logs and drops anything that cannot become a segment
  normalize(raw: unknown): TranscriptSegment | null {
    try {
      return this.parse(raw);
    } catch (error) {
      if (!(error instanceof InputError)) {
        throw error;
      }
      const level =
        error.code === ErrorCodes.EMPTY_SEGMENT ? LogLevel.DEBUG : LogLevel.WARN;
      this.logger.log(level, error.message, "SegmentNormalizer", error.metadata);
      return null;
    }
  }

  parse(raw: unknown): TranscriptSegment {
    const result = rawSegmentSchema.safeParse(raw);
    if (!result.success) {
      throw new InputError("Malformed transcript payload", {
        component: "SegmentNormalizer.parse",
        issues: result.error.issues.map(
          (issue) => `${issue.path.join(".") || "payload"}: ${issue.message}`
        ),
      });
    }

    const payload = result.data;
    const isFinal = payload.isFinal ?? payload.is_final;
    if (isFinal === undefined) {
      throw new InputError("Transcript payload has no finality flag", {
        component: "SegmentNormalizer.parse",
      });
    }

    const text = payload.text.replace(/\s+/g, " ").trim();
    if (!text) {
      throw new InputError(
        "Empty transcript text",
        { component: "SegmentNormalizer.parse" },
        ErrorCodes.EMPTY_SEGMENT
      );
    }

    if (this.filterHallucinations && this.isHallucination(text)) {
      throw new InputError(
        "Filtered known transcription hallucination",
        { component: "SegmentNormalizer.parse", phrase: text },
        ErrorCodes.EMPTY_SEGMENT
      );
    }

    const { spokenAt, streamOffsetMs } = this.parseTimestamp(payload.timestamp);

    return Object.freeze({
      segmentId: this.nextSegmentId++,
      speaker: this.resolveSpeaker(payload.speaker),
      text,
      isFinal,
      receivedAt: this.now(),
      spokenAt,
      streamOffsetMs,
    });
  }

  private isHallucination(text: string): boolean {
    return this.HALLUCINATION_PATTERNS.some((pattern) => pattern.test(text));
  }

  private labelKey(label: string | number): string {
    return String(label)
      .trim()
      .toLowerCase()
      .replace(/^speaker[\s_-]*/, "");
  }

  private resolveSpeaker(label: string | number | null | undefined): Speaker {
    if (label === null || label === undefined) {
      return "unknown";
    }
    return this.speakerLabels[this.labelKey(label)] ?? "unknown";
  }

  private parseTimestamp(
    value: number | string | Date | null | undefined
  ): { spokenAt: Date | null; streamOffsetMs: number | null } {
    if (value === null || value === undefined) {
      return { spokenAt: null, streamOffsetMs: null };
    }

    if (value instanceof Date) {
      return { spokenAt: isValid(value) ? value : null, streamOffsetMs: null };
    }

    const numeric = typeof value === "number" ? value : Number(value);
    if (typeof value === "number" || (value.trim() !== "" && !Number.isNaN(numeric))) {
      if (!Number.isFinite(numeric) || numeric < 0) {
        return { spokenAt: null, streamOffsetMs: null };
      }
      if (numeric >= EPOCH_MILLIS_FLOOR) {
        return { spokenAt: new Date(numeric), streamOffsetMs: null };
      }
      if (numeric >= EPOCH_SECONDS_FLOOR) {
        return { spokenAt: fromUnixTime(numeric), streamOffsetMs: null };
      }
      return { spokenAt: null, streamOffsetMs: Math.round(numeric * 1000) };
    }

    const parsed = parseISO(value);
    if (!isValid(parsed)) {
      this.logger.log(
        LogLevel.DEBUG,
        "Unrecognised provider timestamp",
        "SegmentNormalizer",
        { timestamp: value }
      );
      return { spokenAt: null, streamOffsetMs: null };
    }
    return { spokenAt: parsed, streamOffsetMs: null };
  }
}

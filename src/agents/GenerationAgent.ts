import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import { LoggingService, LogLevel } from "../services/logging/LoggingService";
import type {
  GenerationRequest,
  GenerationService,
} from "../services/generation/GenerationService";
import { runWithDeadline } from "../utils/deadline";
import {
  CoachError,
  ErrorCodes,
  GenerationCancelled,
  GenerationServiceError,
  GenerationTimeout,
  describeError,
} from "../utils/error";
import { categorySchema, meddicFieldSchema, urgencySchema } from "../types/schemas";
import {
  MEDDIC_FIELDS,
  MEDDIC_LABELS,
  type ConversationSnapshot,
  type GeneratedSuggestion,
  type Speaker,
  type SuggestionGenerator,
  type TierResult,
  type TranscriptSegment,
} from "../types";

const responseSchema = z.object({
  suggestion: z
    .object({
      text: z.string().trim().min(1),
      category: categorySchema,
      urgency: urgencySchema.default("medium"),
      // Models drift between 0-1 and percentages; 2 and up reads as a percentage
      confidence: z
        .number()
        .min(0)
        .max(100)
        .transform((value) => (value >= 2 ? value / 100 : Math.min(value, 1)))
        .default(0.7),
      framework: z.string().nullish().transform((value) => value || null),
      rationale: z.string().nullish().transform((value) => value || null),
    })
    .nullish()
    .transform((value) => value ?? null),
  meddicUpdates: z
    .array(
      z.object({
        field: meddicFieldSchema,
        note: z.string().nullish().transform((value) => value?.trim() || null),
      })
    )
    .default([]),
});

export type GenerationResponse = z.infer<typeof responseSchema>;

export const RESPONSE_FORMAT = `Respond with a JSON object of exactly this shape:
{
  "suggestion": null | {
    "text": "what the rep should say or do, at most 25 words",
    "category": "objection" | "buying_signal" | "stall" | "closing" | "discovery" | "reframe",
    "urgency": "high" | "medium" | "low",
    "confidence": number between 0 and 1,
    "framework": "the sales framework behind it, e.g. Chris Voss - Labeling, or null",
    "rationale": "one sentence on why, or null"
  },
  "meddicUpdates": [{ "field": "${MEDDIC_FIELDS.join('" | "')}", "note": "what was learned" }]
}
Use "suggestion": null when nothing useful can be said. Only report MEDDIC fields the prospect clearly established.`;

const SPEAKER_LABELS: Record<Speaker, string> = {
  self: "Rep",
  counterpart: "Prospect",
  unknown: "Speaker",
};

export type SuggestionFields = Omit<GeneratedSuggestion, "sourceTier" | "rationale">;

export interface GenerationAgentOptions {
  service: GenerationService;
  now?: () => number;
}

/**
 * Shared plumbing for the model-backed tiers: prompt assembly is left to the
 * subclass, the budget, error classification and response validation live here.
 *
 * Rejects with GenerationTimeout, GenerationCancelled or GenerationServiceError.
 * Resolves to null when the model had nothing to add.
 */
export abstract class GenerationAgent<S extends GeneratedSuggestion>
  implements SuggestionGenerator<S>
{
  abstract readonly tier: 2 | 3;
  protected readonly service: GenerationService;
  protected readonly now: () => number;
  protected logger: LoggingService;

  constructor(options: GenerationAgentOptions) {
    this.service = options.service;
    this.now = options.now ?? (() => Date.now());
    this.logger = LoggingService.getInstance();
  }

  protected abstract buildRequest(
    segment: TranscriptSegment,
    snapshot: ConversationSnapshot
  ): GenerationRequest;

  protected abstract toSuggestion(fields: SuggestionFields, rationale: string | null): S;

  private get component(): string {
    return this.constructor.name;
  }

  async generate(
    segment: TranscriptSegment,
    snapshot: ConversationSnapshot,
    budgetMs: number,
    signal?: AbortSignal
  ): Promise<TierResult<S> | null> {
    const request = this.buildRequest(segment, snapshot);

    const content = await runWithDeadline(
      budgetMs,
      () =>
        new GenerationTimeout(this.tier, budgetMs, {
          component: `${this.component}.generate`,
          segmentId: segment.segmentId,
        }),
      (deadlineSignal) => this.service.generate(request, deadlineSignal),
      signal
    ).catch((error: unknown) => {
      if (error instanceof CoachError) {
        throw error;
      }
      if (signal?.aborted) {
        throw new GenerationCancelled("aborted by caller", {
          component: `${this.component}.generate`,
          segmentId: segment.segmentId,
          tier: this.tier,
        });
      }
      throw new GenerationServiceError("Generation service failed", {
        component: `${this.component}.generate`,
        segmentId: segment.segmentId,
        tier: this.tier,
        originalError: describeError(error),
      });
    });

    const response = this.parseResponse(content, segment);
    if (!response.suggestion && response.meddicUpdates.length === 0) {
      this.logger.log(LogLevel.DEBUG, "Model returned nothing", this.component, {
        segmentId: segment.segmentId,
      });
      return null;
    }

    const source = this.tier === 2 ? "tier2" : "tier3";
    return {
      suggestion: response.suggestion
        ? this.toSuggestion(
            {
              suggestionId: uuidv4(),
              segmentId: segment.segmentId,
              category: response.suggestion.category,
              urgency: response.suggestion.urgency,
              confidence: response.suggestion.confidence,
              text: response.suggestion.text,
              framework: response.suggestion.framework,
              createdAt: this.now(),
            },
            response.suggestion.rationale
          )
        : null,
      meddicUpdates: response.meddicUpdates.map(({ field, note }) => ({
        field,
        note,
        source,
      })),
    };
  }

  private parseResponse(content: string, segment: TranscriptSegment): GenerationResponse {
    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new GenerationServiceError(
        "Failed to parse model response",
        {
          component: `${this.component}.parseResponse`,
          segmentId: segment.segmentId,
          tier: this.tier,
          originalError: describeError(error),
        },
        ErrorCodes.MALFORMED_RESPONSE
      );
    }

    const result = responseSchema.safeParse(json);
    if (!result.success) {
      throw new GenerationServiceError(
        "Invalid suggestion format from model",
        {
          component: `${this.component}.parseResponse`,
          segmentId: segment.segmentId,
          tier: this.tier,
          issues: result.error.issues.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`
          ),
        },
        ErrorCodes.MALFORMED_RESPONSE
      );
    }
    return result.data;
  }

  protected formatTurns(segments: readonly TranscriptSegment[]): string {
    return segments
      .map((segment) => `${SPEAKER_LABELS[segment.speaker]}: ${segment.text}`)
      .join("\n");
  }

  protected formatLatest(segment: TranscriptSegment): string {
    return `Latest (${SPEAKER_LABELS[segment.speaker]}): "${segment.text}"`;
  }

  protected formatMeddic(snapshot: ConversationSnapshot): string {
    const completed = MEDDIC_FIELDS.filter((field) => snapshot.meddic[field].complete);
    const lines = MEDDIC_FIELDS.map((field) => {
      const state = snapshot.meddic[field];
      const notes = state.notes.length ? ` (${state.notes.join("; ")})` : "";
      return `${state.complete ? "[x]" : "[ ]"} ${MEDDIC_LABELS[field]}${notes}`;
    });
    return [
      `MEDDIC progress ${completed.length}/${MEDDIC_FIELDS.length}:`,
      ...lines,
    ].join("\n");
  }
}

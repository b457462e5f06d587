import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import defaultLibrary from "../data/patterns.json";
import { CoachError, ErrorCodes, ErrorSeverity } from "../utils/error";
import {
  categorySchema,
  meddicFieldSchema,
  speakerSchema,
  urgencySchema,
} from "../types/schemas";
import type {
  MeddicField,
  MeddicFieldState,
  PatternSuggestion,
  SalesStage,
  Speaker,
  SuggestionCategory,
  TranscriptSegment,
} from "../types";

const matchSchema = z
  .object({
    phrases: z.array(z.string().min(1)).default([]),
    tokens: z.array(z.string().min(1)).default([]),
    patterns: z.array(z.string().min(1)).default([]),
  })
  .refine(
    (m) => m.phrases.length + m.tokens.length + m.patterns.length > 0,
    "a predicate needs at least one phrase, token or pattern"
  );

const suggestionEntrySchema = z.object({
  id: z.string().min(1),
  category: categorySchema,
  speakers: z.array(speakerSchema).min(1),
  targets: meddicFieldSchema.optional(),
  match: matchSchema,
  urgency: urgencySchema,
  confidence: z.number().min(0).max(1),
  framework: z.string().nullable(),
  triggerPhrase: z.string(),
  text: z.string().min(1),
});

const patternLibrarySchema = z.object({
  suggestions: z.array(suggestionEntrySchema),
  meddicSignals: z.array(
    z.object({
      field: meddicFieldSchema,
      speakers: z.array(speakerSchema).min(1),
      match: matchSchema,
    })
  ),
  stages: z.array(
    z.object({
      stage: z.enum(["close", "negotiation", "demo"]),
      phrases: z.array(z.string().min(1)).min(1),
    })
  ),
});

export type PatternLibrary = z.infer<typeof patternLibrarySchema>;
export type PatternEntry = z.infer<typeof suggestionEntrySchema>;

// Highest first. Reframe is last since tiers 2/3 own most reframes.
export const CATEGORY_PRIORITY: readonly SuggestionCategory[] = [
  "objection",
  "buying_signal",
  "stall",
  "closing",
  "discovery",
  "reframe",
];

export interface MeddicView {
  readonly meddic: Readonly<Record<MeddicField, Readonly<MeddicFieldState>>>;
}

interface Predicate {
  speakers: ReadonlySet<Speaker>;
  test(text: string): boolean;
}

export function parsePatternLibrary(raw: unknown): PatternLibrary {
  const result = patternLibrarySchema.safeParse(raw);
  if (!result.success) {
    throw new CoachError(
      "Pattern library failed validation",
      ErrorCodes.PATTERN_LIBRARY_INVALID,
      ErrorSeverity.CRITICAL,
      {
        component: "PatternMatcher.parsePatternLibrary",
        issues: result.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`
        ),
      }
    );
  }
  return result.data;
}

function compilePredicate(
  id: string,
  speakers: Speaker[],
  match: PatternEntry["match"]
): Predicate {
  const phrases = match.phrases.map((phrase) => phrase.toLowerCase());
  const tokens = new Set(match.tokens.map((token) => token.toLowerCase()));
  const patterns = match.patterns.map((source) => {
    try {
      return new RegExp(source, "i");
    } catch (error) {
      throw new CoachError(
        `Invalid pattern in library entry ${id}`,
        ErrorCodes.PATTERN_LIBRARY_INVALID,
        ErrorSeverity.CRITICAL,
        {
          component: "PatternMatcher.compilePredicate",
          pattern: source,
          originalError: error instanceof Error ? error.message : String(error),
        }
      );
    }
  });

  return {
    speakers: new Set(speakers),
    test(text: string): boolean {
      const lower = text.toLowerCase();
      if (phrases.some((phrase) => lower.includes(phrase))) {
        return true;
      }
      if (tokens.size > 0) {
        const words = lower.match(/[a-z0-9']+/g) ?? [];
        if (words.some((word) => tokens.has(word))) {
          return true;
        }
      }
      return patterns.some((pattern) => pattern.test(text));
    },
  };
}

interface CompiledEntry {
  entry: PatternEntry;
  predicate: Predicate;
}

/**
 * Tier 1: synchronous, rule-based scan of a single segment.
 *
 * Entries are checked in library order and the first hit in each category
 * wins; across categories the result follows CATEGORY_PRIORITY. Discovery
 * entries that ask about a MEDDIC field are skipped once that field is complete.
 * No I/O, never mutates the state it reads.
 */
export class PatternMatcher {
  private readonly entries: CompiledEntry[];
  private readonly signals: Array<{ field: MeddicField; predicate: Predicate }>;
  private readonly stages: Array<{ stage: SalesStage; phrases: string[] }>;
  private readonly now: () => number;

  constructor(
    library: PatternLibrary = parsePatternLibrary(defaultLibrary),
    options: { now?: () => number } = {}
  ) {
    this.entries = library.suggestions.map((entry) => ({
      entry,
      predicate: compilePredicate(entry.id, entry.speakers, entry.match),
    }));
    this.signals = library.meddicSignals.map((signal) => ({
      field: signal.field,
      predicate: compilePredicate(`signal:${signal.field}`, signal.speakers, signal.match),
    }));
    this.stages = library.stages.map((s) => ({
      stage: s.stage,
      phrases: s.phrases.map((p) => p.toLowerCase()),
    }));
    this.now = options.now ?? (() => Date.now());
  }

  get size(): number {
    return this.entries.length;
  }

  match(segment: TranscriptSegment, state: MeddicView): PatternSuggestion | null {
    const hits = new Map<SuggestionCategory, PatternEntry>();

    for (const { entry, predicate } of this.entries) {
      if (hits.has(entry.category)) continue;
      if (!predicate.speakers.has(segment.speaker)) continue;
      if (entry.targets && state.meddic[entry.targets].complete) continue;
      if (predicate.test(segment.text)) {
        hits.set(entry.category, entry);
      }
    }

    for (const category of CATEGORY_PRIORITY) {
      const entry = hits.get(category);
      if (entry) {
        return {
          suggestionId: uuidv4(),
          sourceTier: 1,
          segmentId: segment.segmentId,
          category: entry.category,
          urgency: entry.urgency,
          confidence: entry.confidence,
          text: entry.text,
          framework: entry.framework,
          createdAt: this.now(),
          patternId: entry.id,
          triggerPhrase: entry.triggerPhrase,
        };
      }
    }

    return null;
  }

  // MEDDIC fields the speech itself satisfies
  addressedFields(segment: TranscriptSegment): MeddicField[] {
    const fields: MeddicField[] = [];
    for (const { field, predicate } of this.signals) {
      if (
        predicate.speakers.has(segment.speaker) &&
        predicate.test(segment.text) &&
        !fields.includes(field)
      ) {
        fields.push(field);
      }
    }
    return fields;
  }

  detectStage(texts: readonly string[]): SalesStage {
    const text = texts.join(" ").toLowerCase();
    for (const { stage, phrases } of this.stages) {
      if (phrases.some((phrase) => text.includes(phrase))) {
        return stage;
      }
    }
    return "discovery";
  }
}

import type { GenerationRequest } from "../services/generation/GenerationService";
import type {
  ConversationSnapshot,
  ReframeSuggestion,
  TranscriptSegment,
} from "../types";
import {
  GenerationAgent,
  RESPONSE_FORMAT,
  type GenerationAgentOptions,
  type SuggestionFields,
} from "./GenerationAgent";

export interface ContextualReframerOptions extends GenerationAgentOptions {
  contextTurns: number;
}

/**
 * Tier 2: a fast, small-context pass over the last few turns that suggests
 * how to reframe or answer what was just said.
 */
export class ContextualReframer extends GenerationAgent<ReframeSuggestion> {
  readonly tier = 2 as const;
  private readonly contextTurns: number;

  constructor(options: ContextualReframerOptions) {
    super(options);
    this.contextTurns = options.contextTurns;
  }

  protected buildRequest(
    segment: TranscriptSegment,
    snapshot: ConversationSnapshot
  ): GenerationRequest {
    const turns = snapshot.window.slice(-this.contextTurns);

    return {
      tier: this.tier,
      system: this.getSystemPrompt(),
      prompt: [
        "Recent conversation:",
        this.formatTurns(turns),
        "",
        this.formatLatest(segment),
      ].join("\n"),
      maxTokens: 200,
      temperature: 0.3,
    };
  }

  protected toSuggestion(
    fields: SuggestionFields,
    rationale: string | null
  ): ReframeSuggestion {
    return { ...fields, sourceTier: 2, rationale };
  }

  private getSystemPrompt(): string {
    return `You are a sales coach whispering to a rep during a live call.
Look at the last few turns and suggest ONE short line the rep can say next.
Prefer reframing what the prospect just said: label the emotion, mirror their words, or turn a concern into a question.
If the rep just spoke, only suggest something when they missed an obvious opening.

${RESPONSE_FORMAT}`;
  }
}

import type { GenerationRequest } from "../services/generation/GenerationService";
import {
  MEDDIC_FIELDS,
  MEDDIC_LABELS,
  type ConversationSnapshot,
  type PreCallBrief,
  type StrategicSuggestion,
  type TranscriptSegment,
} from "../types";
import {
  GenerationAgent,
  RESPONSE_FORMAT,
  type SuggestionFields,
} from "./GenerationAgent";

/**
 * Tier 3: full-context strategy over the whole window, the MEDDIC map and
 * the pre-call brief. Slow; the scheduler keeps at most one in flight.
 */
export class StrategicAnalyzer extends GenerationAgent<StrategicSuggestion> {
  readonly tier = 3 as const;

  protected buildRequest(
    segment: TranscriptSegment,
    snapshot: ConversationSnapshot
  ): GenerationRequest {
    const gaps = MEDDIC_FIELDS.filter((field) => !snapshot.meddic[field].complete);

    return {
      tier: this.tier,
      system: this.getSystemPrompt(),
      prompt: [
        this.formatBrief(snapshot.brief),
        "",
        `Call stage: ${snapshot.stage}`,
        this.formatMeddic(snapshot),
        gaps.length
          ? `Gaps to cover: ${gaps.map((field) => MEDDIC_LABELS[field]).join(", ")}`
          : "All MEDDIC fields are covered.",
        "",
        "Conversation so far:",
        this.formatTurns(snapshot.window),
        "",
        this.formatLatest(segment),
      ].join("\n"),
      maxTokens: 400,
      temperature: 0.4,
    };
  }

  protected toSuggestion(
    fields: SuggestionFields,
    rationale: string | null
  ): StrategicSuggestion {
    return { ...fields, sourceTier: 3, rationale };
  }

  private formatBrief(brief: PreCallBrief): string {
    const { name, company, role } = brief.prospect;
    const lines = [`Prospect: ${name}${role ? `, ${role}` : ""} at ${company}`];
    if (brief.currentSolution) {
      lines.push(`Current solution: ${brief.currentSolution}`);
    }
    if (brief.anticipatedObjections.length) {
      lines.push(
        "Anticipated objections:",
        ...brief.anticipatedObjections.map((objection) => `- ${objection}`)
      );
    }
    if (brief.notes) {
      lines.push(`Notes: ${brief.notes}`);
    }
    return lines.join("\n");
  }

  private getSystemPrompt(): string {
    return `You are a senior sales strategist coaching a rep during a live discovery call.
Use MEDDIC to steer the call: move the rep toward the biggest gap, get ahead of anticipated objections, and spot moments to advance the deal.
Apply Chris Voss techniques (labeling, mirroring, calibrated questions) where they fit.
Give ONE suggestion, grounded in what the prospect actually said.

${RESPONSE_FORMAT}`;
  }
}

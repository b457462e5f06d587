import OpenAI from "openai";
import { LoggingService, LogLevel } from "../logging/LoggingService";
import {
  CoachError,
  ErrorCodes,
  ErrorSeverity,
  GenerationServiceError,
  describeError,
} from "../../utils/error";

export interface GenerationRequest {
  tier: 2 | 3;
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

/**
 * The language-model boundary. Implementations must honour `signal` and fail
 * with GenerationServiceError for anything other than an abort.
 */
export interface GenerationService {
  generate(request: GenerationRequest, signal: AbortSignal): Promise<string>;
}

export interface OpenAIGenerationOptions {
  apiKey: string | null;
  models: Record<2 | 3, string>;
}

export class OpenAIGenerationService implements GenerationService {
  private openai: OpenAI;
  private models: Record<2 | 3, string>;
  private logger: LoggingService;

  constructor(options: OpenAIGenerationOptions) {
    if (!options.apiKey) {
      throw new CoachError(
        "OpenAI API key not configured",
        ErrorCodes.GENERATION_UNAVAILABLE,
        ErrorSeverity.HIGH,
        { component: "OpenAIGenerationService" }
      );
    }

    // Retries would blow the tier budgets; the scheduler decides what happens next
    this.openai = new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
    this.models = options.models;
    this.logger = LoggingService.getInstance();
  }

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<string> {
    const model = this.models[request.tier];
    const startedAt = performance.now();

    const completion = await this.openai.chat.completions
      .create(
        {
          model,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.prompt },
          ],
          response_format: { type: "json_object" },
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        },
        { signal }
      )
      .catch((error: unknown) => {
        throw new GenerationServiceError(
          signal.aborted ? "OpenAI request aborted" : "OpenAI API call failed",
          {
            component: "OpenAIGenerationService.generate",
            tier: request.tier,
            model,
            aborted: signal.aborted,
            originalError: describeError(error),
          }
        );
      });

    this.logger.log(LogLevel.DEBUG, "Completion received", "OpenAIGenerationService", {
      tier: request.tier,
      model,
      latencyMs: Math.round(performance.now() - startedAt),
      usage: completion.usage,
    });

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new GenerationServiceError(
        "Empty response from OpenAI",
        { component: "OpenAIGenerationService.generate", tier: request.tier, model },
        ErrorCodes.MALFORMED_RESPONSE
      );
    }
    return content;
  }
}

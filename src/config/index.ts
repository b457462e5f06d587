import { z } from "zod";
import { CoachError, ErrorCodes, ErrorSeverity } from "../utils/error";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  FRONTEND_URL: z.string().default("http://localhost:5173"),
  OPENAI_API_KEY: z.string().optional(),
  COACH_TIER2_MODEL: z.string().default("gpt-4o-mini"),
  COACH_TIER3_MODEL: z.string().default("gpt-4o"),
  COACH_TIER2_BUDGET_MS: z.coerce.number().int().positive().default(800),
  COACH_TIER3_BUDGET_MS: z.coerce.number().int().positive().default(2000),
  COACH_TIER2_CONTEXT_TURNS: z.coerce.number().int().positive().default(4),
  COACH_WINDOW_SIZE: z.coerce.number().int().positive().default(20),
  COACH_DISPLAY_WINDOW: z.coerce.number().int().positive().default(5),
  COACH_TIER2_MAX_LAG: z.coerce.number().int().nonnegative().default(1),
  COACH_TIER3_MAX_LAG: z.coerce.number().int().nonnegative().default(3),
  COACH_TIER3_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(3),
  COACH_SUBSCRIBER_CAPACITY: z.coerce.number().int().positive().default(32),
  COACH_TIER1_ON_INTERIM: booleanFlag.default("false"),
  COACH_REPEAT_COOLDOWN_MS: z.coerce.number().int().nonnegative().default(60000),
  COACH_FILTER_HALLUCINATIONS: booleanFlag.default("true"),
  COACH_BRIEF_PATH: z.string().optional(),
});

export interface CoachConfig {
  windowSize: number;
  displayWindow: number;
  tier1OnInterim: boolean;
  repeatCooldownMs: number;
  filterHallucinations: boolean;
  subscriberCapacity: number;
  tier2: { budgetMs: number; contextTurns: number; maxLag: number; model: string };
  tier3: { budgetMs: number; maxLag: number; failureThreshold: number; model: string };
}

export interface ServerConfig {
  port: number;
  frontendUrl: string;
  openaiApiKey: string | null;
  briefPath: string | null;
}

export const DEFAULT_COACH_CONFIG: CoachConfig = {
  windowSize: 20,
  displayWindow: 5,
  tier1OnInterim: false,
  repeatCooldownMs: 60000,
  filterHallucinations: true,
  subscriberCapacity: 32,
  tier2: { budgetMs: 800, contextTurns: 4, maxLag: 1, model: "gpt-4o-mini" },
  tier3: { budgetMs: 2000, maxLag: 3, failureThreshold: 3, model: "gpt-4o" },
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): {
  coach: CoachConfig;
  server: ServerConfig;
} {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new CoachError(
      "Invalid configuration",
      ErrorCodes.INVALID_CONFIG,
      ErrorSeverity.CRITICAL,
      {
        component: "config.loadConfig",
        issues: parsed.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`
        ),
      }
    );
  }

  const vars = parsed.data;
  return {
    coach: {
      windowSize: vars.COACH_WINDOW_SIZE,
      displayWindow: vars.COACH_DISPLAY_WINDOW,
      tier1OnInterim: vars.COACH_TIER1_ON_INTERIM,
      repeatCooldownMs: vars.COACH_REPEAT_COOLDOWN_MS,
      filterHallucinations: vars.COACH_FILTER_HALLUCINATIONS,
      subscriberCapacity: vars.COACH_SUBSCRIBER_CAPACITY,
      tier2: {
        budgetMs: vars.COACH_TIER2_BUDGET_MS,
        contextTurns: vars.COACH_TIER2_CONTEXT_TURNS,
        maxLag: vars.COACH_TIER2_MAX_LAG,
        model: vars.COACH_TIER2_MODEL,
      },
      tier3: {
        budgetMs: vars.COACH_TIER3_BUDGET_MS,
        maxLag: vars.COACH_TIER3_MAX_LAG,
        failureThreshold: vars.COACH_TIER3_FAILURE_THRESHOLD,
        model: vars.COACH_TIER3_MODEL,
      },
    },
    server: {
      port: vars.PORT,
      frontendUrl: vars.FRONTEND_URL,
      openaiApiKey: vars.OPENAI_API_KEY || null,
      briefPath: vars.COACH_BRIEF_PATH || null,
    },
  };
}

import { readFile } from "fs/promises";
import { z } from "zod";
import { CoachError, ErrorCodes, ErrorSeverity, describeError } from "../../utils/error";
import { meddicFieldSchema } from "../../types/schemas";
import type { PreCallBrief } from "../../types";

interface MeddicSeed {
  complete: boolean;
  notes: string[];
}

// `true`, a note, or { complete, notes }
const seedSchema = z.union([
  z.boolean().transform((complete): MeddicSeed => ({ complete, notes: [] })),
  z.string().min(1).transform((note): MeddicSeed => ({ complete: true, notes: [note] })),
  z.object({
    complete: z.boolean().default(true),
    notes: z.array(z.string()).default([]),
  }),
]);

export const preCallBriefSchema = z.object({
  prospect: z
    .object({
      name: z.string().min(1).default("Prospect"),
      company: z.string().min(1).default("their company"),
      role: z.string().nullish().transform((value) => value ?? null),
    })
    .default({}),
  currentSolution: z.string().nullish().transform((value) => value ?? null),
  meddic: z.record(meddicFieldSchema, seedSchema).default({}),
  anticipatedObjections: z.array(z.string().min(1)).default([]),
  notes: z.string().nullish().transform((value) => value ?? null),
});

export type PreCallBriefInput = z.input<typeof preCallBriefSchema>;

export function parsePreCallBrief(raw: unknown): PreCallBrief {
  const result = preCallBriefSchema.safeParse(raw);
  if (!result.success) {
    throw new CoachError("Invalid pre-call brief", ErrorCodes.INVALID_BRIEF, ErrorSeverity.HIGH, {
      component: "PreCallBrief.parse",
      issues: result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      ),
    });
  }
  return result.data;
}

export async function loadPreCallBrief(path: string): Promise<PreCallBrief> {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (error) {
    throw new CoachError("Failed to read pre-call brief", ErrorCodes.INVALID_BRIEF, ErrorSeverity.HIGH, {
      component: "PreCallBrief.load",
      path,
      originalError: describeError(error),
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch (error) {
    throw new CoachError("Pre-call brief is not valid JSON", ErrorCodes.INVALID_BRIEF, ErrorSeverity.HIGH, {
      component: "PreCallBrief.load",
      path,
      originalError: describeError(error),
    });
  }
  return parsePreCallBrief(json);
}

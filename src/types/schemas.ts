import { z } from "zod";

export const speakerSchema = z.enum(["self", "counterpart", "unknown"]);

export const meddicFieldSchema = z.enum([
  "metrics",
  "economic_buyer",
  "decision_criteria",
  "decision_process",
  "pain",
  "champion",
]);

export const categorySchema = z.enum([
  "objection",
  "buying_signal",
  "stall",
  "closing",
  "discovery",
  "reframe",
]);

export const urgencySchema = z.enum(["high", "medium", "low"]);

import { describe, expect, it } from "vitest";
import { z } from "zod";
import { toErrorResponse } from "../errorHandler";
import { CoachError, ErrorCodes, ErrorSeverity, InputError } from "../../../utils/error";

describe("toErrorResponse", () => {
  it("maps validation errors to 400", () => {
    const parsed = z.object({ suggestionId: z.string() }).safeParse({});
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    const { status, body } = toErrorResponse(parsed.error);

    expect(status).toBe(400);
    expect(body.error).toMatchObject({ message: "Validation error", code: "VALIDATION_ERROR" });
  });

  it("maps a missing call to 404", () => {
    const error = new CoachError("No call has been started", ErrorCodes.CALL_NOT_ACTIVE, ErrorSeverity.LOW, {
      component: "test",
    });

    expect(toErrorResponse(error)).toEqual({
      status: 404,
      body: { error: { message: "No call has been started", code: "CALL_NOT_ACTIVE" } },
    });
  });

  it("maps bad input to 400 and other coach errors to 500", () => {
    expect(toErrorResponse(new InputError("bad", { component: "test" })).status).toBe(400);
    expect(
      toErrorResponse(
        new CoachError("boom", ErrorCodes.GENERATION_FAILED, ErrorSeverity.HIGH, { component: "test" })
      ).status
    ).toBe(500);
  });

  it("hides the details of unknown errors", () => {
    expect(toErrorResponse(new Error("secret stack detail"))).toEqual({
      status: 500,
      body: { error: { message: "Internal server error", code: "INTERNAL_SERVER_ERROR" } },
    });
  });
});

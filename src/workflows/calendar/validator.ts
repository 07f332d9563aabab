import { config } from "../../config/index.js";
import { defineCheck, ParallelValidator } from "../../orchestrator/parallel-validator.js";
import { assertThreshold, meetsThreshold } from "../../orchestrator/thresholds.js";
import { CalendarValidation, SecurityCheck } from "./contracts.js";
import { CALENDAR_VALIDATION_PROMPT, SECURITY_CHECK_PROMPT } from "./prompts.js";

export interface CalendarValidatorOptions {
  /** Overrides VALIDATOR_CONFIDENCE_THRESHOLD for the calendar check */
  threshold?: number;
}

/**
 * Calendar-intent and security checks, run concurrently.
 */
export function createCalendarValidator(options: CalendarValidatorOptions = {}): ParallelValidator {
  const threshold =
    options.threshold === undefined ? undefined : assertThreshold(options.threshold, "calendar check");

  return new ParallelValidator("calendar_request", [
    defineCheck({
      name: "calendar",
      contract: CalendarValidation,
      systemContext: CALENDAR_VALIDATION_PROMPT,
      verdict: (result) =>
        result.is_calendar_request &&
        meetsThreshold(result.confidence_score, threshold ?? config.orchestration.validatorConfidenceThreshold),
    }),
    defineCheck({
      name: "security",
      contract: SecurityCheck,
      systemContext: SECURITY_CHECK_PROMPT,
      verdict: (result) => result.is_safe,
    }),
  ]);
}

/**
 * Outcome types shared by the orchestration components.
 *
 * Rejections are control-flow outcomes, not errors: a chain whose gate fails
 * or a router that declines to dispatch returns a `Rejected` value, while
 * gateway failures propagate as thrown errors.
 */

/** Number in [0,1] reported by a classification or extraction call. */
export type ConfidenceScore = number;

export interface GateDecision {
  readonly passed: boolean;
  readonly flag: boolean;
  readonly confidence: ConfidenceScore;
  readonly threshold: number;
}

export type RejectionReason = "gate_failed" | "low_confidence" | "unsupported_category";

export interface Rejected<R extends RejectionReason = RejectionReason> {
  readonly status: "rejected";
  readonly reason: R;
}

export interface ResponseEnvelope {
  readonly success: boolean;
  readonly message: string;
  readonly link?: string;
}

export interface CheckResult {
  readonly name: string;
  readonly valid: boolean;
  /** The check's structured result, kept verbatim */
  readonly detail: unknown;
}

export interface ValidationOutcome {
  readonly overallValid: boolean;
  /** In check registration order */
  readonly checks: readonly CheckResult[];
}

export interface RouteDecision<C extends string = string> {
  readonly category: C;
  readonly confidence: ConfidenceScore;
  readonly cleanedDescription: string;
}

/**
 * A system context is fixed text, or a function evaluated when the stage
 * runs (for prompts that embed the current date).
 */
export type SystemContext = string | (() => string);

export function resolveSystemContext(context: SystemContext): string {
  return typeof context === "function" ? context() : context;
}

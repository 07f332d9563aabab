import { GatedChain } from "../../orchestrator/gated-chain.js";
import type { ResponseEnvelope } from "../../orchestrator/types.js";
import { EventConfirmation, EventDetails, EventExtraction } from "./contracts.js";
import { CONFIRMATION_PROMPT, detailsPrompt, extractionPrompt, systemClock, type Clock } from "./prompts.js";

export interface EventChainOptions {
  clock?: Clock;
  /** Overrides CHAIN_GATE_THRESHOLD */
  threshold?: number;
}

export interface EventSummary {
  readonly name: string;
  readonly date: string;
  readonly duration_minutes: number;
  readonly participants: readonly string[];
}

export function describeEvent(details: EventSummary): string {
  return [
    `Event: ${details.name}`,
    `Date: ${details.date}`,
    `Duration: ${details.duration_minutes} minutes`,
    `Participants: ${details.participants.length > 0 ? details.participants.join(", ") : "none"}`,
  ].join("\n");
}

/**
 * Extraction (gate) → details → confirmation → envelope.
 */
export function createEventChain(options: EventChainOptions = {}) {
  const clock = options.clock ?? systemClock;

  return GatedChain.start(
    {
      name: "event_extraction",
      contract: EventExtraction,
      systemContext: () => extractionPrompt(clock),
      signal: (extraction) => ({
        flag: extraction.is_calendar_event,
        confidence: extraction.confidence_score,
      }),
    },
    { name: "calendar_event", threshold: options.threshold },
  )
    .then({
      name: "event_details",
      contract: EventDetails,
      systemContext: () => detailsPrompt(clock),
      userContext: (extraction) => extraction.description,
    })
    .then({
      name: "event_confirmation",
      contract: EventConfirmation,
      systemContext: CONFIRMATION_PROMPT,
      userContext: (details) => describeEvent(details),
    })
    .map(
      "envelope",
      (confirmation): ResponseEnvelope => ({
        success: true,
        message: confirmation.confirmation_message,
        ...(confirmation.calendar_link ? { link: confirmation.calendar_link } : {}),
      }),
    );
}

export type EventChain = ReturnType<typeof createEventChain>;

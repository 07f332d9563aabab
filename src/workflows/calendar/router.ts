import { ConfidenceRouter, type HandlerMap } from "../../orchestrator/confidence-router.js";
import type { ResponseEnvelope } from "../../orchestrator/types.js";
import {
  CalendarRequestType,
  ModifyEventDetails,
  NewEventDetails,
  type CalendarCategory,
} from "./contracts.js";
import { modifyEventPrompt, newEventPrompt, ROUTER_PROMPT, systemClock, type Clock } from "./prompts.js";

export interface CalendarRouterOptions {
  clock?: Clock;
  /** Overrides ROUTER_CONFIDENCE_THRESHOLD */
  threshold?: number;
}

export function newEventLink(name: string): string {
  return `calendar://new?event=${encodeURIComponent(name)}`;
}

export function modifyEventLink(identifier: string): string {
  return `calendar://modify?event=${encodeURIComponent(identifier)}`;
}

export function calendarHandlers(clock: Clock): HandlerMap<CalendarCategory> {
  return {
    new_event: async (decision, caller, opts): Promise<ResponseEnvelope> => {
      const details = await caller.call(
        newEventPrompt(clock),
        decision.cleanedDescription,
        NewEventDetails,
        opts,
      );
      const participants = details.participants.length > 0 ? details.participants.join(", ") : "no participants";
      return {
        success: true,
        message: `Created new event '${details.name}' for ${details.date} (${details.duration_minutes} minutes) with ${participants}`,
        link: newEventLink(details.name),
      };
    },

    modify_event: async (decision, caller, opts): Promise<ResponseEnvelope> => {
      const details = await caller.call(
        modifyEventPrompt(clock),
        decision.cleanedDescription,
        ModifyEventDetails,
        opts,
      );
      const edits = [
        ...details.changes.map((change) => `${change.field}: ${change.new_value}`),
        ...details.participants_to_add.map((name) => `add ${name}`),
        ...details.participants_to_remove.map((name) => `remove ${name}`),
      ];
      return {
        success: true,
        message:
          edits.length > 0
            ? `Modified event '${details.event_identifier}': ${edits.join("; ")}`
            : `Modified event '${details.event_identifier}' with the requested changes`,
        link: modifyEventLink(details.event_identifier),
      };
    },
  };
}

/**
 * Classify as new_event / modify_event / other and dispatch.
 */
export function createCalendarRouter(options: CalendarRouterOptions = {}) {
  const clock = options.clock ?? systemClock;

  return new ConfidenceRouter<CalendarCategory, typeof CalendarRequestType.schema>({
    name: "calendar",
    classifier: { contract: CalendarRequestType, systemContext: ROUTER_PROMPT },
    toDecision: (classification) => ({
      category: classification.request_type,
      confidence: classification.confidence_score,
      cleanedDescription: classification.description,
    }),
    handlers: calendarHandlers(clock),
    threshold: options.threshold,
  });
}

export type CalendarRouter = ReturnType<typeof createCalendarRouter>;

import type { StructuredCallGateway } from "../adapters/llm/gateway.js";
import type { ParallelValidator } from "../orchestrator/parallel-validator.js";
import type { EventChain } from "../workflows/calendar/chain.js";
import type { CalendarRouter } from "../workflows/calendar/router.js";
import type { SupportRouter } from "../workflows/support/router.js";

/**
 * Everything a route needs, constructed once by `build()`.
 */
export interface WorkflowDeps {
  gateway: StructuredCallGateway;
  eventChain: EventChain;
  calendarValidator: ParallelValidator;
  calendarRouter: CalendarRouter;
  supportRouter: SupportRouter;
}

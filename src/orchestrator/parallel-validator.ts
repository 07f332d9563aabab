/**
 * Parallel Validator
 *
 * Issues every check's structured call concurrently against the same input
 * and joins on all of them. The combined verdict is the AND of the
 * per-check verdicts, and results are reported in registration order, so
 * the outcome never depends on which branch finished first.
 *
 * Partial failure: branches are never cancelled. When a branch fails, the
 * validator still waits for every sibling to settle, then rejects with a
 * ParallelCheckError whose `cause` is the first failed branch in
 * registration order.
 */

import type { z } from "zod";
import type { OutputContract } from "../contracts/contract.js";
import type { GatewayCallOptions, StructuredCaller } from "../adapters/llm/gateway.js";
import { isGatewayError } from "../adapters/llm/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { resolveSystemContext, type CheckResult, type SystemContext, type ValidationOutcome } from "./types.js";

export interface CheckDefinition<T extends z.AnyZodObject> {
  readonly name: string;
  readonly contract: OutputContract<T>;
  readonly systemContext: SystemContext;
  /** Check verdict: its boolean field plus any check-specific threshold */
  readonly verdict: (result: Readonly<z.infer<T>>) => boolean;
}

export interface Check {
  readonly name: string;
  run(caller: StructuredCaller, input: string, opts: GatewayCallOptions): Promise<CheckResult>;
}

export function defineCheck<T extends z.AnyZodObject>(definition: CheckDefinition<T>): Check {
  return {
    name: definition.name,
    async run(caller, input, opts) {
      const detail = await caller.call(
        resolveSystemContext(definition.systemContext),
        input,
        definition.contract,
        opts,
      );
      return { name: definition.name, valid: definition.verdict(detail), detail };
    },
  };
}

export interface CheckFailure {
  readonly check: string;
  readonly error: unknown;
}

export class ParallelCheckError extends Error {
  readonly name = "ParallelCheckError";

  constructor(
    public readonly validator: string,
    public readonly failures: readonly [CheckFailure, ...CheckFailure[]],
  ) {
    const [first] = failures;
    const reason = first.error instanceof Error ? first.error.message : String(first.error);
    super(`${validator}: check "${first.check}" failed: ${reason}`, { cause: first.error });
  }

  /** Name of the check whose error is the cause */
  get failedCheck(): string {
    return this.failures[0].check;
  }
}

export class ValidatorDefinitionError extends Error {
  readonly name = "ValidatorDefinitionError";
}

export class ParallelValidator {
  private readonly checks: readonly Check[];

  constructor(
    readonly name: string,
    checks: readonly Check[],
  ) {
    if (checks.length === 0) {
      throw new ValidatorDefinitionError(`${name}: at least one check is required`);
    }
    const seen = new Set<string>();
    for (const check of checks) {
      if (seen.has(check.name)) {
        throw new ValidatorDefinitionError(`${name}: duplicate check name "${check.name}"`);
      }
      seen.add(check.name);
    }
    this.checks = [...checks];
  }

  get checkNames(): string[] {
    return this.checks.map((check) => check.name);
  }

  async validate(
    caller: StructuredCaller,
    input: string,
    opts: GatewayCallOptions = {},
  ): Promise<ValidationOutcome> {
    const startTime = Date.now();
    const settled = await Promise.allSettled(
      this.checks.map((check) => check.run(caller, input, opts)),
    );

    const results: CheckResult[] = [];
    const failures: CheckFailure[] = [];
    settled.forEach((branch, index) => {
      const check = this.checks[index].name;
      if (branch.status === "fulfilled") {
        results.push(branch.value);
        return;
      }
      failures.push({ check, error: branch.reason });
      emit(TelemetryEvents.ValidatorBranchFailed, {
        validator: this.name,
        check,
        request_id: opts.requestId,
        error_kind: isGatewayError(branch.reason) ? branch.reason.kind : "unknown",
      });
    });

    const [firstFailure, ...otherFailures] = failures;
    if (firstFailure) {
      throw new ParallelCheckError(this.name, [firstFailure, ...otherFailures]);
    }

    const overallValid = results.every((result) => result.valid);
    emit(TelemetryEvents.ValidatorCompleted, {
      validator: this.name,
      request_id: opts.requestId,
      overall_valid: overallValid,
      checks: results.map((result) => ({ name: result.name, valid: result.valid })),
      latency_ms: Date.now() - startTime,
    });

    return { overallValid, checks: results };
  }
}

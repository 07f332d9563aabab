/**
 * Gate-Checked Chain Executor
 *
 * Runs an ordered sequence of structured calls. The first call (the gate) is
 * checked with `flag === true && confidence >= threshold`; when that fails the
 * chain returns a rejection and no further call is issued.
 *
 * Later stages only see the previous stage's output: the user context builder
 * receives nothing else, so the raw input cannot leak past the gate stage.
 *
 * ```ts
 * const chain = GatedChain.start(extractStage)
 *   .then(detailsStage)
 *   .then(confirmationStage)
 *   .map("envelope", toEnvelope);
 * const outcome = await chain.run(gateway, "Schedule lunch with Ann");
 * ```
 */

import type { z } from "zod";
import { config } from "../config/index.js";
import type { OutputContract } from "../contracts/contract.js";
import type { GatewayCallOptions, StructuredCaller } from "../adapters/llm/gateway.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { assertThreshold, meetsThreshold } from "./thresholds.js";
import { resolveSystemContext, type GateDecision, type Rejected, type SystemContext } from "./types.js";

export interface GateSignal {
  readonly flag: boolean;
  readonly confidence: number;
}

export interface GateStage<T extends z.AnyZodObject> {
  readonly name: string;
  readonly contract: OutputContract<T>;
  readonly systemContext: SystemContext;
  /** Reads the gate flag and confidence out of the gate result */
  readonly signal: (result: Readonly<z.infer<T>>) => GateSignal;
}

export interface ChainStage<P, T extends z.AnyZodObject> {
  readonly name: string;
  readonly contract: OutputContract<T>;
  readonly systemContext: SystemContext;
  /** Builds this stage's user context from the previous stage's output */
  readonly userContext: (previous: P) => string;
}

export interface ChainOptions {
  /** Chain name for telemetry; defaults to the gate stage name */
  name?: string;
  /** Gate threshold; defaults to CHAIN_GATE_THRESHOLD */
  threshold?: number;
}

export type ChainOutcome<O> =
  | { readonly status: "done"; readonly result: O; readonly gate: GateDecision }
  | (Rejected<"gate_failed"> & { readonly gate: GateDecision });

type GateRunner<G> = (caller: StructuredCaller, input: string, opts: GatewayCallOptions) => Promise<G>;
type Tail<G, O> = (gateResult: G, caller: StructuredCaller, opts: GatewayCallOptions) => Promise<O>;

export class GatedChain<G, O> {
  private constructor(
    private readonly chainName: string,
    private readonly threshold: number | undefined,
    private readonly runGate: GateRunner<G>,
    private readonly signal: (gateResult: G) => GateSignal,
    private readonly tail: Tail<G, O>,
    readonly stageNames: readonly string[],
  ) {}

  static start<T extends z.AnyZodObject>(
    gate: GateStage<T>,
    options: ChainOptions = {},
  ): GatedChain<Readonly<z.infer<T>>, Readonly<z.infer<T>>> {
    const threshold =
      options.threshold === undefined ? undefined : assertThreshold(options.threshold, "chain gate");

    return new GatedChain<Readonly<z.infer<T>>, Readonly<z.infer<T>>>(
      options.name ?? gate.name,
      threshold,
      (caller, input, opts) =>
        caller.call(resolveSystemContext(gate.systemContext), input, gate.contract, opts),
      gate.signal,
      async (gateResult) => gateResult,
      [gate.name],
    );
  }

  /**
   * Append a structured call whose user context is derived from the
   * current output.
   */
  then<T extends z.AnyZodObject>(stage: ChainStage<O, T>): GatedChain<G, Readonly<z.infer<T>>> {
    const previous = this.tail;
    return new GatedChain<G, Readonly<z.infer<T>>>(
      this.chainName,
      this.threshold,
      this.runGate,
      this.signal,
      async (gateResult, caller, opts) => {
        const prior = await previous(gateResult, caller, opts);
        return caller.call(
          resolveSystemContext(stage.systemContext),
          stage.userContext(prior),
          stage.contract,
          opts,
        );
      },
      [...this.stageNames, stage.name],
    );
  }

  /**
   * Append a deterministic step that issues no call.
   */
  map<R>(name: string, fn: (previous: O) => R): GatedChain<G, R> {
    const previous = this.tail;
    return new GatedChain<G, R>(
      this.chainName,
      this.threshold,
      this.runGate,
      this.signal,
      async (gateResult, caller, opts) => fn(await previous(gateResult, caller, opts)),
      [...this.stageNames, name],
    );
  }

  async run(
    caller: StructuredCaller,
    input: string,
    opts: GatewayCallOptions = {},
  ): Promise<ChainOutcome<O>> {
    const threshold = this.threshold ?? config.orchestration.chainGateThreshold;

    const gateResult = await this.runGate(caller, input, opts);
    const { flag, confidence } = this.signal(gateResult);
    const gate: GateDecision = {
      passed: flag === true && meetsThreshold(confidence, threshold),
      flag,
      confidence,
      threshold,
    };

    if (!gate.passed) {
      emit(TelemetryEvents.ChainGateRejected, {
        chain: this.chainName,
        request_id: opts.requestId,
        flag,
        confidence,
        threshold,
      });
      return { status: "rejected", reason: "gate_failed", gate };
    }

    const result = await this.tail(gateResult, caller, opts);

    emit(TelemetryEvents.ChainCompleted, {
      chain: this.chainName,
      request_id: opts.requestId,
      stages: this.stageNames.length,
      confidence,
    });
    return { status: "done", result, gate };
  }
}

import { z } from "zod";
import { defineContract } from "../../contracts/contract.js";
import { ConfidenceRouter, type HandlerMap } from "../../orchestrator/confidence-router.js";
import type { KnowledgeBase, KnowledgeRecord } from "./knowledge-base.js";

export const SUPPORT_REQUEST_TYPES = ["knowledge_question", "other"] as const;
export type SupportCategory = (typeof SUPPORT_REQUEST_TYPES)[number];

export const SupportRequestType = defineContract(
  "support_request_type",
  z.object({
    request_type: z.enum(SUPPORT_REQUEST_TYPES).describe("knowledge_question for product questions the FAQ may answer, otherwise other"),
    confidence_score: z.number().min(0).max(1).describe("Confidence score between 0 and 1"),
    description: z.string().describe("The question restated without greetings or filler"),
  }),
  "Classify a customer support message",
);

export const KnowledgeAnswer = defineContract(
  "knowledge_answer",
  z.object({
    answer: z.string().describe("Answer to the user's question, based only on the records provided"),
    source_id: z.number().int().nullable().describe("id of the record the answer is based on, or null when no record applies"),
  }),
);

const CLASSIFIER_PROMPT = "Decide whether the message is a question about the product that a FAQ could answer.";

export function knowledgeRecordLink(id: number): string {
  return `kb://record/${id}`;
}

export function answerPrompt(records: readonly KnowledgeRecord[]): string {
  return [
    "You are a support assistant. Answer using only these knowledge base records.",
    "If none of them applies, say so and set source_id to null.",
    "",
    JSON.stringify({ records }, null, 2),
  ].join("\n");
}

export function supportHandlers(knowledgeBase: KnowledgeBase): HandlerMap<SupportCategory> {
  return {
    knowledge_question: async (decision, caller, opts) => {
      const records = await knowledgeBase.lookup(decision.cleanedDescription);
      const answer = await caller.call(answerPrompt(records), decision.cleanedDescription, KnowledgeAnswer, opts);
      // Only a record that is actually in the corpus earns a link
      const source = records.find((record) => record.id === answer.source_id);
      return {
        success: true,
        message: answer.answer,
        ...(source ? { link: knowledgeRecordLink(source.id) } : {}),
      };
    },
  };
}

export function createSupportRouter(knowledgeBase: KnowledgeBase, options: { threshold?: number } = {}) {
  return new ConfidenceRouter<SupportCategory, typeof SupportRequestType.schema>({
    name: "support",
    classifier: { contract: SupportRequestType, systemContext: CLASSIFIER_PROMPT },
    toDecision: (classification) => ({
      category: classification.request_type,
      confidence: classification.confidence_score,
      cleanedDescription: classification.description,
    }),
    handlers: supportHandlers(knowledgeBase),
    threshold: options.threshold,
  });
}

export type SupportRouter = ReturnType<typeof createSupportRouter>;

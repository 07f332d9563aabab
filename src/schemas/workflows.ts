import { z } from "zod";

export const WorkflowInput = z
  .object({
    // Checked, not trimmed: the text reaches the gateway as sent
    input: z.string().refine((text) => text.trim().length > 0, "input must not be empty"),
  })
  .strict();

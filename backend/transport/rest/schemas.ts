import { z } from "zod";

// Text fields stay unbounded: the use cases trim, truncate or fall back on their own.
export const analyzeRequestSchema = z.object({
  content: z.string(),
  language: z.string().nullish(),
  user_id: z.string().trim().max(200).nullish(),
});

export const chatRequestSchema = z.object({
  message: z.string(),
  session_id: z.string().trim().max(200).nullish(),
  user_id: z.string().trim().max(200).nullish(),
});

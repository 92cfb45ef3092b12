import { z } from "zod";
import { SCORE_MAX, SCORE_MIN, SWOT_FIELDS } from "../constants";

/**
 * Schemas for student submissions and the evaluation/SWOT results built from them.
 * - Request shapes strip unknown keys; response shapes are strict.
 */

export const SubmissionItemSchema = z.object({
  // Echoed back verbatim in ScoreDetail, so it is checked but never rewritten.
  question_id: z.string().refine((id) => id.trim().length > 0, "question_id must not be blank"),
  question: z.string().trim().min(1),
  actual_answer: z.string(),
  expected_answer: z.string(),
});

export type SubmissionItem = z.infer<typeof SubmissionItemSchema>;

export const SubmissionSchema = z
  .object({
    items: z.array(SubmissionItemSchema).min(1, "Submission must contain at least one item"),
  })
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.items.forEach((item, index) => {
      const key = item.question_id.trim();
      if (seen.has(key)) {
        ctx.addIssue({
          code: "custom",
          path: ["items", index, "question_id"],
          message: `Duplicate question_id: ${item.question_id}`,
        });
      }
      seen.add(key);
    });
  });

export type Submission = z.infer<typeof SubmissionSchema>;

export const ScoreSchema = z.number().min(SCORE_MIN).max(SCORE_MAX);

export const ScoreDetailSchema = z
  .object({
    question_id: z.string().min(1),
    question: z.string(),
    score: ScoreSchema,
    correct: z.boolean(),
    feedback: z.string(),
  })
  .strict();

export type ScoreDetail = z.infer<typeof ScoreDetailSchema>;

export const ScoreResponseSchema = z
  .object({
    total_score: z.number().nonnegative(),
    details: z.array(ScoreDetailSchema),
  })
  .strict();

export type ScoreResponse = z.infer<typeof ScoreResponseSchema>;

export type SwotField = (typeof SWOT_FIELDS)[number];

export const SWOTResponseSchema = z
  .object({
    strengths: z.string(),
    weaknesses: z.string(),
    opportunities: z.string(),
    threats: z.string(),
  })
  .strict();

export type SWOTResponse = z.infer<typeof SWOTResponseSchema>;

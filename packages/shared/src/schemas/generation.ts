import { z } from "zod";
import { ALTERNATIVE_COUNT, MAX_GENERATED_QUESTIONS } from "../constants";

const NonEmptyText = z.string().trim().min(1);

// Topics behave as a case-insensitive set: trimmed, blank entries dropped, first spelling wins.
const TopicsSchema = z
  .array(z.string())
  .transform((topics) => {
    const seen = new Set<string>();
    return topics
      .map((topic) => topic.trim())
      .filter((topic) => {
        const key = topic.toLowerCase();
        if (!topic || seen.has(key)) {
          return false;
        }
        seen.add(key);
        return true;
      });
  })
  .pipe(z.array(z.string()).min(1, "Provide at least one topic"));

export const DateRangeSchema = z.object({
  start_date: NonEmptyText,
  end_date: NonEmptyText,
});

export type DateRange = z.infer<typeof DateRangeSchema>;

export const QuestionGenerationRequestSchema = z.object({
  title: NonEmptyText,
  subject: NonEmptyText,
  class_level: NonEmptyText.optional(),
  date_range: DateRangeSchema.optional(),
  question_type: NonEmptyText.default("short answer"),
  count: z.number().int().positive().max(MAX_GENERATED_QUESTIONS),
  difficulty: NonEmptyText.default("medium"),
  topics: TopicsSchema,
  instructions: z.string().trim().optional(),
  description: z.string().trim().optional(),
  max_score: z.number().positive().optional(),
  passing_score: z.number().nonnegative().optional(),
});

export type QuestionGenerationRequest = z.infer<typeof QuestionGenerationRequestSchema>;

export const GeneratedQuestionSchema = z
  .object({
    question: NonEmptyText,
    expected_answer: z.string(),
  })
  .strict();

export type GeneratedQuestion = z.infer<typeof GeneratedQuestionSchema>;

export const QuestionGenerationResponseSchema = z
  .object({
    questions: z.array(GeneratedQuestionSchema),
  })
  .strict();

export type QuestionGenerationResponse = z.infer<typeof QuestionGenerationResponseSchema>;

export const AlternativeRequestSchema = z.object({
  id: z.union([NonEmptyText, z.number().int()]).transform((value) => String(value)),
  subtopic: NonEmptyText,
  difficulty: NonEmptyText,
  marks: z.number().positive(),
});

export type AlternativeRequest = z.infer<typeof AlternativeRequestSchema>;

export const AlternativeQuestionSchema = GeneratedQuestionSchema;

export type AlternativeQuestion = z.infer<typeof AlternativeQuestionSchema>;

export const AlternativeResponseSchema = z.array(AlternativeQuestionSchema).length(ALTERNATIVE_COUNT);

export type AlternativeResponse = z.infer<typeof AlternativeResponseSchema>;

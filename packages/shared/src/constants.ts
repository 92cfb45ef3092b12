// packages/shared/src/constants.ts

/** Inclusive score range for a single evaluated answer. */
export const SCORE_MIN = 0;
export const SCORE_MAX = 10;

/** Alternative-question responses always carry exactly this many entries. */
export const ALTERNATIVE_COUNT = 3;

/** Upper bound on questions generated per request. */
export const MAX_GENERATED_QUESTIONS = 50;

/** Placeholder content substituted when a model sub-item cannot be recovered. */
export const EVALUATION_FALLBACK_FEEDBACK = "Unable to parse evaluation";
export const SWOT_FALLBACK_TEXT = "Unable to parse SWOT analysis";
export const QUESTION_FALLBACK_TEXT = "Unable to generate question";
export const EXPECTED_ANSWER_FALLBACK_TEXT = "Expected answer unavailable";

/** The four sections of a SWOT summary, in response order. */
export const SWOT_FIELDS = ["strengths", "weaknesses", "opportunities", "threats"] as const;

/** Output targets the normalizer can produce. */
export const NORMALIZATION_TARGETS = [
  "evaluation",
  "swot",
  "generated_questions",
  "alternatives",
] as const;

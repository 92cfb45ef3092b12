import { z } from "zod";
import {
  ALTERNATIVE_COUNT,
  AlternativeResponseSchema,
  EVALUATION_FALLBACK_FEEDBACK,
  EXPECTED_ANSWER_FALLBACK_TEXT,
  NORMALIZATION_TARGETS,
  QUESTION_FALLBACK_TEXT,
  QuestionGenerationResponseSchema,
  SCORE_MAX,
  SCORE_MIN,
  SWOT_FALLBACK_TEXT,
  SWOT_FIELDS,
  ScoreResponseSchema,
  ScoreSchema,
  SWOTResponseSchema,
  type AlternativeResponse,
  type GeneratedQuestion,
  type QuestionGenerationResponse,
  type ScoreDetail,
  type ScoreResponse,
  type Submission,
  type SubmissionItem,
  type SwotField,
  type SWOTResponse,
} from "@evalbridge/shared";
import { SchemaError } from "../../errors";
import {
  extractLabelledSections,
  isRecord,
  listEntries,
  parseJsonPayload,
  readAliasedProperty,
  readLooseField,
  scanObjectFragments,
  splitProseBlocks,
  tryParseJson,
  type LabelAliases,
} from "./modelOutput";

/**
 * Response normalizer: model text in, schema-valid records out.
 *
 * Each target goes through strict JSON parsing, then lenient recovery, then a
 * per-item fallback. Shape problems in the model text never throw; every
 * substitution is reported as a ParseFallback for the caller to log.
 */

export type NormalizationTarget = (typeof NORMALIZATION_TARGETS)[number];

export type ParseFallback = {
  target: NormalizationTarget;
  index?: number;
  question_id?: string;
  field?: string;
  reason: string;
};

export type Normalized<T> = {
  value: T;
  fallbacks: ParseFallback[];
};

const EVALUATION_CONTAINERS = ["details", "evaluations", "evaluation", "results", "items", "questions"];
const QUESTION_CONTAINERS = ["questions", "alternatives", "items", "results"];

const QUESTION_ID_KEYS = ["question_id", "questionId", "id"];
const QUESTION_TEXT_KEYS = ["question", "question_text", "questionText", "text", "prompt"];
const SCORE_KEYS = ["score", "marks", "points", "rating", "grade"];
const CORRECT_KEYS = ["correct", "is_correct", "isCorrect", "correctness"];
const FEEDBACK_KEYS = ["feedback", "comment", "comments", "explanation", "remarks"];
const EXPECTED_ANSWER_KEYS = ["expected_answer", "expectedAnswer", "answer", "model_answer", "modelAnswer", "solution"];

const EVALUATION_LABELS: LabelAliases<"question" | "student" | "expected" | "score" | "correct" | "feedback"> = [
  ["question", ["question"]],
  ["student", ["student answer", "actual answer", "your answer"]],
  ["expected", ["expected answer", "model answer"]],
  ["score", ["score", "marks", "points", "rating"]],
  ["correct", ["correct", "is correct", "correctness", "verdict"]],
  ["feedback", ["feedback", "comments", "comment", "explanation"]],
];

const QUESTION_LABELS: LabelAliases<"question" | "answer"> = [
  ["question", ["question"]],
  ["answer", ["expected answer", "answer", "model answer", "solution"]],
];

const SWOT_LABELS: LabelAliases<SwotField> = [
  ["strengths", ["strengths", "strength"]],
  ["weaknesses", ["weaknesses", "weakness"]],
  ["opportunities", ["opportunities", "opportunity"]],
  ["threats", ["threats", "threat"]],
];

const StrictEvaluationEntrySchema = z.object({
  question_id: z.string().optional(),
  question: z.string().optional(),
  score: ScoreSchema,
  correct: z.boolean(),
  feedback: z.string().trim().min(1),
});

const StrictQuestionEntrySchema = z.object({
  question: z.string().trim().min(1),
  expected_answer: z.string().trim().min(1),
});

type EvaluationDraft = {
  questionId?: string;
  question?: string;
  score?: number;
  correct?: boolean;
  feedback?: string;
  // Zero-based item position taken from a numbered prose block.
  position?: number;
  strict: boolean;
};

type QuestionDraft = {
  question?: string;
  expectedAnswer?: string;
  strict: boolean;
};

function assertText(raw: unknown, target: NormalizationTarget): string {
  if (typeof raw !== "string") {
    throw new SchemaError(`Expected model text for ${target}, received ${raw === null ? "null" : typeof raw}.`);
  }
  return raw;
}

function roundTo2(value: number) {
  return Math.round(value * 100) / 100;
}

export function clampScore(value: number) {
  return roundTo2(Math.min(SCORE_MAX, Math.max(SCORE_MIN, value)));
}

/**
 * Reads a score from a number or from text such as "8", "8.5/10", "4 out of 5".
 * Denominators other than 10 are rescaled; the result is not yet clamped.
 */
export function readScore(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== "string") {
    return undefined;
  }
  const match = value.match(/(-?\d+(?:\.\d+)?)\s*(?:\/\s*(\d+(?:\.\d+)?)|out\s+of\s+(\d+(?:\.\d+)?))?/i);
  if (!match) {
    return undefined;
  }
  const score = Number(match[1]);
  const denominator = Number(match[2] ?? match[3] ?? SCORE_MAX);
  if (!Number.isFinite(score)) {
    return undefined;
  }
  return denominator > 0 && denominator !== SCORE_MAX ? (score / denominator) * SCORE_MAX : score;
}

/** Maps boolean-ish tokens (yes/no, true/false, correct/incorrect) to a boolean. */
export function readCorrectness(value: unknown): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return value === 1 ? true : value === 0 ? false : undefined;
  }
  if (typeof value !== "string") {
    return undefined;
  }
  const token = value.trim().toLowerCase().replace(/^[*_"'\s]+/, "");
  if (/^(incorrect|not correct|wrong|false|no|n)\b/.test(token)) {
    return false;
  }
  if (/^(correct|true|yes|y|right)\b/.test(token)) {
    return true;
  }
  return undefined;
}

function readText(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed ? trimmed : undefined;
  }
  if (typeof value === "number") {
    return String(value);
  }
  if (Array.isArray(value)) {
    const parts = value.filter((part): part is string => typeof part === "string" && part.trim().length > 0);
    return parts.length > 0 ? parts.map((part) => part.trim()).join("\n") : undefined;
  }
  return undefined;
}

function normalizeQuestionText(value: string) {
  return value.trim().toLowerCase().replace(/\s+/g, " ");
}

/* ----------------------------- Evaluation --------------------------- */

function evaluationFromRecord(record: Record<string, unknown>): EvaluationDraft {
  const strict = StrictEvaluationEntrySchema.safeParse(record);
  if (strict.success) {
    return {
      questionId: strict.data.question_id,
      question: strict.data.question,
      score: strict.data.score,
      correct: strict.data.correct,
      feedback: strict.data.feedback.trim(),
      strict: true,
    };
  }

  return {
    questionId: readText(readAliasedProperty(record, QUESTION_ID_KEYS)),
    question: readText(readAliasedProperty(record, QUESTION_TEXT_KEYS)),
    score: readScore(readAliasedProperty(record, SCORE_KEYS)),
    correct: readCorrectness(readAliasedProperty(record, CORRECT_KEYS)),
    feedback: readText(readAliasedProperty(record, FEEDBACK_KEYS)),
    strict: false,
  };
}

function evaluationFromLooseText(text: string): EvaluationDraft {
  return {
    questionId: readText(readLooseField(text, QUESTION_ID_KEYS)),
    question: readText(readLooseField(text, QUESTION_TEXT_KEYS)),
    score: readScore(readLooseField(text, SCORE_KEYS)),
    correct: readCorrectness(readLooseField(text, CORRECT_KEYS)),
    feedback: readText(readLooseField(text, FEEDBACK_KEYS)),
    strict: false,
  };
}

function evaluationFromProse(text: string, number?: number): EvaluationDraft {
  const { sections } = extractLabelledSections(text, EVALUATION_LABELS);
  return {
    position: number !== undefined && number > 0 ? number - 1 : undefined,
    question: sections.question,
    score: readScore(sections.score),
    correct: readCorrectness(sections.correct),
    feedback: sections.feedback,
    strict: false,
  };
}

function hasEvaluationContent(draft: EvaluationDraft) {
  return draft.score !== undefined || draft.correct !== undefined || draft.feedback !== undefined;
}

function evaluationFromEntry(entry: unknown): EvaluationDraft {
  if (isRecord(entry)) {
    return evaluationFromRecord(entry);
  }
  return typeof entry === "string" ? evaluationFromProse(entry) : { strict: false };
}

function recoverEvaluationDrafts(text: string): EvaluationDraft[] {
  const payload = parseJsonPayload(text);
  const entries = listEntries(payload, EVALUATION_CONTAINERS) ?? (isRecord(payload) ? [payload] : undefined);
  if (entries) {
    // Empty entries stay in place so positional matching still lines up.
    const drafts = entries.map(evaluationFromEntry);
    if (drafts.some(hasEvaluationContent)) {
      return drafts;
    }
  }

  const fragments = scanObjectFragments(text);
  if (fragments.length > 0 || payload !== undefined) {
    return fragments.map((fragment) => {
      const parsed = fragment.complete ? tryParseJson(fragment.text) : undefined;
      return isRecord(parsed) ? evaluationFromRecord(parsed) : evaluationFromLooseText(fragment.text);
    });
  }

  // No JSON at all: read "Score: 7/10" style prose, one block per numbered question.
  // Numbered blocks stay even when empty; unnumbered commentary without content is dropped.
  return splitProseBlocks(text)
    .map((block) => evaluationFromProse(block.text, block.number))
    .filter((draft) => draft.position !== undefined || hasEvaluationContent(draft));
}

/**
 * Pairs drafts with submission items: by question_id, then by prose question
 * number, then by echoed question text, then by order among whatever is left.
 */
function matchDraftsToItems(items: SubmissionItem[], drafts: EvaluationDraft[]) {
  const used = new Set<number>();
  const assigned: Array<EvaluationDraft | undefined> = items.map(() => undefined);

  const claim = (itemIndex: number, matches: (draft: EvaluationDraft) => boolean) => {
    if (assigned[itemIndex]) {
      return;
    }
    const draftIndex = drafts.findIndex((draft, index) => !used.has(index) && matches(draft));
    if (draftIndex !== -1) {
      used.add(draftIndex);
      assigned[itemIndex] = drafts[draftIndex];
    }
  };

  items.forEach((item, itemIndex) => {
    const wanted = item.question_id.trim();
    claim(itemIndex, (draft) => draft.questionId !== undefined && draft.questionId.trim() === wanted);
  });

  items.forEach((_item, itemIndex) => {
    claim(itemIndex, (draft) => draft.position === itemIndex);
  });

  items.forEach((item, itemIndex) => {
    const wanted = normalizeQuestionText(item.question);
    claim(itemIndex, (draft) => draft.question !== undefined && normalizeQuestionText(draft.question) === wanted);
  });

  let cursor = 0;
  items.forEach((_item, itemIndex) => {
    if (assigned[itemIndex]) {
      return;
    }
    while (cursor < drafts.length && used.has(cursor)) {
      cursor += 1;
    }
    if (cursor < drafts.length) {
      used.add(cursor);
      assigned[itemIndex] = drafts[cursor];
      cursor += 1;
    }
  });

  return { assigned, unused: drafts.length - used.size };
}

export function normalizeEvaluation(raw: unknown, submission: Submission): Normalized<ScoreResponse> {
  const text = assertText(raw, "evaluation");
  const fallbacks: ParseFallback[] = [];
  const { assigned, unused } = matchDraftsToItems(submission.items, recoverEvaluationDrafts(text));

  const details = submission.items.map((item, index): ScoreDetail => {
    const draft = assigned[index];
    if (!draft || !hasEvaluationContent(draft)) {
      fallbacks.push({
        target: "evaluation",
        index,
        question_id: item.question_id,
        reason: draft ? "Entry had no recognizable score, correctness or feedback." : "No entry for this question.",
      });
      return {
        question_id: item.question_id,
        question: item.question,
        score: SCORE_MIN,
        correct: false,
        feedback: EVALUATION_FALLBACK_FEEDBACK,
      };
    }

    if (!draft.strict) {
      const missing = [
        draft.score === undefined ? "score" : undefined,
        draft.correct === undefined ? "correct" : undefined,
        draft.feedback === undefined ? "feedback" : undefined,
      ].filter((field): field is string => field !== undefined);
      fallbacks.push({
        target: "evaluation",
        index,
        question_id: item.question_id,
        reason:
          missing.length > 0
            ? `Recovered leniently; defaulted ${missing.join(", ")}.`
            : "Recovered leniently from malformed entry.",
      });
    }

    // A leniently recovered entry is only marked correct when its score needed no clamping.
    const scoreInRange = draft.score !== undefined && draft.score >= SCORE_MIN && draft.score <= SCORE_MAX;
    return {
      question_id: item.question_id,
      question: item.question,
      score: clampScore(draft.score ?? SCORE_MIN),
      correct: draft.strict ? draft.correct === true : scoreInRange && draft.correct === true,
      feedback: draft.feedback ?? EVALUATION_FALLBACK_FEEDBACK,
    };
  });

  if (unused > 0) {
    fallbacks.push({ target: "evaluation", reason: `Discarded ${unused} unmatched entries.` });
  }

  const total = roundTo2(details.reduce((sum, detail) => sum + detail.score, 0));
  return {
    value: ScoreResponseSchema.parse({ total_score: total, details }),
    fallbacks,
  };
}

/* ----------------------------- SWOT --------------------------- */

function findSwotRecord(payload: unknown) {
  if (Array.isArray(payload)) {
    return payload.find(isRecord);
  }
  if (!isRecord(payload)) {
    return undefined;
  }
  const nested = readAliasedProperty(payload, ["swot", "swot_analysis", "analysis"]);
  return isRecord(nested) ? nested : payload;
}

export function normalizeSwot(raw: unknown): Normalized<SWOTResponse> {
  const text = assertText(raw, "swot");
  const fallbacks: ParseFallback[] = [];
  const record = findSwotRecord(parseJsonPayload(text));

  const strict = record ? SWOTResponseSchema.safeParse(record) : undefined;
  if (strict?.success && SWOT_FIELDS.every((field) => strict.data[field].trim().length > 0)) {
    return {
      value: SWOTResponseSchema.parse({
        strengths: strict.data.strengths.trim(),
        weaknesses: strict.data.weaknesses.trim(),
        opportunities: strict.data.opportunities.trim(),
        threats: strict.data.threats.trim(),
      }),
      fallbacks,
    };
  }

  const { sections } = extractLabelledSections(text, SWOT_LABELS);
  const resolveField = (field: SwotField) => {
    const direct = record ? readAliasedProperty(record, [field]) : undefined;
    if (typeof direct === "string" && direct.trim()) {
      return direct.trim();
    }

    const recovered = readText(direct) ?? readText(readLooseField(text, [field])) ?? readText(sections[field]);
    if (recovered === undefined) {
      fallbacks.push({ target: "swot", field, reason: `No recoverable ${field} section.` });
      return SWOT_FALLBACK_TEXT;
    }
    fallbacks.push({ target: "swot", field, reason: `Recovered ${field} leniently.` });
    return recovered;
  };

  return {
    value: SWOTResponseSchema.parse({
      strengths: resolveField("strengths"),
      weaknesses: resolveField("weaknesses"),
      opportunities: resolveField("opportunities"),
      threats: resolveField("threats"),
    }),
    fallbacks,
  };
}

/* ----------------------------- Question lists --------------------------- */

function questionFromRecord(record: Record<string, unknown>): QuestionDraft {
  const strict = StrictQuestionEntrySchema.safeParse(record);
  if (strict.success) {
    return { question: strict.data.question, expectedAnswer: strict.data.expected_answer, strict: true };
  }
  return {
    question: readText(readAliasedProperty(record, QUESTION_TEXT_KEYS)),
    expectedAnswer: readText(readAliasedProperty(record, EXPECTED_ANSWER_KEYS)),
    strict: false,
  };
}

function questionFromLooseText(text: string): QuestionDraft {
  return {
    question: readText(readLooseField(text, QUESTION_TEXT_KEYS)),
    expectedAnswer: readText(readLooseField(text, EXPECTED_ANSWER_KEYS)),
    strict: false,
  };
}

function questionFromProse(text: string): QuestionDraft & { labelled: boolean } {
  const { sections, preamble } = extractLabelledSections(text, QUESTION_LABELS);
  return {
    question: sections.question || preamble || undefined,
    expectedAnswer: sections.answer || undefined,
    strict: false,
    labelled: sections.question !== undefined || sections.answer !== undefined,
  };
}

function questionFromEntry(entry: unknown): QuestionDraft {
  if (isRecord(entry)) {
    return questionFromRecord(entry);
  }
  return typeof entry === "string" ? questionFromProse(entry) : { strict: false };
}

function recoverQuestionDrafts(text: string): QuestionDraft[] {
  const payload = parseJsonPayload(text);
  const entries = listEntries(payload, QUESTION_CONTAINERS) ?? (isRecord(payload) ? [payload] : undefined);
  if (entries) {
    const drafts = entries.map(questionFromEntry);
    if (drafts.some((draft) => draft.question !== undefined)) {
      return drafts;
    }
  }

  const fragments = scanObjectFragments(text);
  if (fragments.length > 0 || payload !== undefined) {
    return fragments
      .map((fragment) => {
        const parsed = fragment.complete ? tryParseJson(fragment.text) : undefined;
        return isRecord(parsed) ? questionFromRecord(parsed) : questionFromLooseText(fragment.text);
      })
      .filter((draft) => draft.question !== undefined || draft.expectedAnswer !== undefined);
  }

  // Unnumbered prose without an answer label is commentary, not a question.
  return splitProseBlocks(text)
    .map((block) => ({ block, draft: questionFromProse(block.text) }))
    .filter(({ block, draft }) => draft.question !== undefined && (block.number !== undefined || draft.labelled))
    .map(({ draft }) => draft);
}

function resolveQuestions(drafts: QuestionDraft[], target: NormalizationTarget, fallbacks: ParseFallback[]) {
  return drafts.map((draft, index): GeneratedQuestion => {
    if (draft.question === undefined) {
      fallbacks.push({ target, index, reason: "Entry had no question text." });
      return { question: QUESTION_FALLBACK_TEXT, expected_answer: EXPECTED_ANSWER_FALLBACK_TEXT };
    }
    if (!draft.strict) {
      fallbacks.push({
        target,
        index,
        reason:
          draft.expectedAnswer === undefined
            ? "Recovered leniently; defaulted expected_answer."
            : "Recovered leniently from malformed entry.",
      });
    }
    return { question: draft.question, expected_answer: draft.expectedAnswer ?? EXPECTED_ANSWER_FALLBACK_TEXT };
  });
}

export function normalizeGeneratedQuestions(raw: unknown, count: number): Normalized<QuestionGenerationResponse> {
  const text = assertText(raw, "generated_questions");
  const fallbacks: ParseFallback[] = [];
  const drafts = recoverQuestionDrafts(text);

  if (drafts.length > count) {
    fallbacks.push({
      target: "generated_questions",
      reason: `Model produced ${drafts.length} questions; kept the first ${count}.`,
    });
  }
  const questions = resolveQuestions(drafts.slice(0, count), "generated_questions", fallbacks);
  if (questions.length < count) {
    fallbacks.push({
      target: "generated_questions",
      reason: `Model produced ${questions.length} of ${count} requested questions.`,
    });
  }

  return { value: QuestionGenerationResponseSchema.parse({ questions }), fallbacks };
}

export function normalizeAlternatives(raw: unknown): Normalized<AlternativeResponse> {
  const text = assertText(raw, "alternatives");
  const fallbacks: ParseFallback[] = [];
  const drafts = recoverQuestionDrafts(text);

  if (drafts.length > ALTERNATIVE_COUNT) {
    fallbacks.push({
      target: "alternatives",
      reason: `Model produced ${drafts.length} alternatives; kept the first ${ALTERNATIVE_COUNT}.`,
    });
  }
  const alternatives = resolveQuestions(drafts.slice(0, ALTERNATIVE_COUNT), "alternatives", fallbacks);
  for (let index = alternatives.length; index < ALTERNATIVE_COUNT; index += 1) {
    fallbacks.push({ target: "alternatives", index, reason: "Padded missing alternative." });
    alternatives.push({ question: QUESTION_FALLBACK_TEXT, expected_answer: EXPECTED_ANSWER_FALLBACK_TEXT });
  }

  return { value: AlternativeResponseSchema.parse(alternatives), fallbacks };
}

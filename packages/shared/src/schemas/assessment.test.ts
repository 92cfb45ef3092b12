import { describe, expect, it } from "vitest";
import { ScoreDetailSchema, SubmissionSchema } from "./assessment";
import { submissionSample } from "./samples/submission.sample";

describe("SubmissionSchema", () => {
  it("accepts the sample submission unchanged", () => {
    expect(SubmissionSchema.parse(submissionSample)).toEqual(submissionSample);
  });

  it("rejects an empty item list", () => {
    const result = SubmissionSchema.safeParse({ items: [] });
    expect(result.success).toBe(false);
  });

  it("rejects duplicate question ids", () => {
    const item = submissionSample.items[0];
    const result = SubmissionSchema.safeParse({ items: [item, item] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["items", 1, "question_id"]);
      expect(result.error.issues[0]?.message).toBe("Duplicate question_id: q1");
    }
  });

  it("keeps question ids exactly as submitted", () => {
    const parsed = SubmissionSchema.parse({
      items: [{ ...submissionSample.items[0], question_id: " q1 " }],
    });
    expect(parsed.items[0].question_id).toBe(" q1 ");
  });

  it("rejects blank question ids and ids that differ only by padding", () => {
    const item = submissionSample.items[0];
    expect(SubmissionSchema.safeParse({ items: [{ ...item, question_id: "   " }] }).success).toBe(false);
    const padded = SubmissionSchema.safeParse({ items: [item, { ...item, question_id: " q1" }] });
    expect(padded.success).toBe(false);
  });

  it("allows a blank student answer", () => {
    const result = SubmissionSchema.safeParse({
      items: [{ question_id: "q1", question: "Define osmosis.", actual_answer: "", expected_answer: "..." }],
    });
    expect(result.success).toBe(true);
  });

  it("strips unknown keys from items", () => {
    const parsed = SubmissionSchema.parse({
      items: [{ ...submissionSample.items[0], extra: "ignored" }],
    });
    expect(parsed.items[0]).toEqual(submissionSample.items[0]);
  });
});

describe("ScoreDetailSchema", () => {
  it("rejects scores outside 0-10", () => {
    const detail = { question_id: "q1", question: "Q", score: 11, correct: true, feedback: "ok" };
    expect(ScoreDetailSchema.safeParse(detail).success).toBe(false);
    expect(ScoreDetailSchema.safeParse({ ...detail, score: 10 }).success).toBe(true);
  });
});

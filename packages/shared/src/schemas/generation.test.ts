import { describe, expect, it } from "vitest";
import {
  AlternativeRequestSchema,
  AlternativeResponseSchema,
  QuestionGenerationRequestSchema,
} from "./generation";

describe("QuestionGenerationRequestSchema", () => {
  const base = { title: "Unit test", subject: "Biology", count: 3, topics: ["Cells"] };

  it("applies defaults for optional settings", () => {
    const parsed = QuestionGenerationRequestSchema.parse(base);
    expect(parsed.question_type).toBe("short answer");
    expect(parsed.difficulty).toBe("medium");
    expect(parsed.class_level).toBeUndefined();
  });

  it("treats topics as a set", () => {
    const parsed = QuestionGenerationRequestSchema.parse({
      ...base,
      topics: [" Cells ", "Osmosis", "Cells", ""],
    });
    expect(parsed.topics).toEqual(["Cells", "Osmosis"]);
  });

  it("compares topics case-insensitively and keeps the first spelling", () => {
    const parsed = QuestionGenerationRequestSchema.parse({
      ...base,
      topics: ["Cell Division", "cells", "CELL DIVISION", "Cells"],
    });
    expect(parsed.topics).toEqual(["Cell Division", "cells"]);
  });

  it("rejects blank topic lists", () => {
    expect(QuestionGenerationRequestSchema.safeParse({ ...base, topics: ["  "] }).success).toBe(false);
  });

  it("rejects non-positive and fractional counts", () => {
    expect(QuestionGenerationRequestSchema.safeParse({ ...base, count: 0 }).success).toBe(false);
    expect(QuestionGenerationRequestSchema.safeParse({ ...base, count: -2 }).success).toBe(false);
    expect(QuestionGenerationRequestSchema.safeParse({ ...base, count: 1.5 }).success).toBe(false);
  });

  it("caps the count", () => {
    expect(QuestionGenerationRequestSchema.safeParse({ ...base, count: 51 }).success).toBe(false);
    expect(QuestionGenerationRequestSchema.safeParse({ ...base, count: 50 }).success).toBe(true);
  });
});

describe("AlternativeRequestSchema", () => {
  it("renders numeric ids as strings", () => {
    const parsed = AlternativeRequestSchema.parse({
      id: 42,
      subtopic: "Fractions",
      difficulty: "easy",
      marks: 2,
    });
    expect(parsed.id).toBe("42");
  });

  it("rejects zero marks", () => {
    const result = AlternativeRequestSchema.safeParse({
      id: "a1",
      subtopic: "Fractions",
      difficulty: "easy",
      marks: 0,
    });
    expect(result.success).toBe(false);
  });
});

describe("AlternativeResponseSchema", () => {
  it("requires exactly three alternatives", () => {
    const alt = { question: "Q", expected_answer: "A" };
    expect(AlternativeResponseSchema.safeParse([alt, alt]).success).toBe(false);
    expect(AlternativeResponseSchema.safeParse([alt, alt, alt]).success).toBe(true);
  });
});

import type { Submission } from "../assessment";

export const submissionSample: Submission = {
  items: [
    {
      question_id: "q1",
      question: "What is the capital of France?",
      actual_answer: "Paris",
      expected_answer: "Paris",
    },
    {
      question_id: "q2",
      question: "What is 2 + 2?",
      actual_answer: "5",
      expected_answer: "4",
    },
  ],
};

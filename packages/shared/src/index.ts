export * from "./constants";
export * from "./schemas/assessment";
export * from "./schemas/generation";
export { submissionSample } from "./schemas/samples/submission.sample";

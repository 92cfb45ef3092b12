import type { FastifyInstance } from "fastify";
import { createAssessmentController, type AssessmentControllerDeps } from "./assessment.controller";

export function registerAssessmentRoutes(app: FastifyInstance, deps: AssessmentControllerDeps) {
  const controller = createAssessmentController(deps);

  app.post("/evaluate", controller.evaluate);  // Scores each answer in a submission, one detail per item.
  app.post("/swot", controller.swot);  // Overall strengths/weaknesses/opportunities/threats for a submission.
  app.post("/generate-qa", controller.generateQuestions);  // Generates a test's questions with expected answers.
  app.post("/generate-alternatives", controller.generateAlternatives);  // Exactly three replacement questions for one slot.
  app.get("/health-check", controller.healthCheck);
}

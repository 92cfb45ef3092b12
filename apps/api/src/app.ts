import Fastify, { type FastifyError, type FastifyServerOptions } from "fastify";
import type { AssessmentControllerDeps } from "./modules/assessment/assessment.controller";
import { registerAssessmentRoutes } from "./modules/assessment/assessment.routes";

export type BuildAppOptions = AssessmentControllerDeps & {
  logger?: FastifyServerOptions["logger"];
};

export function buildApp(options: BuildAppOptions) {
  const { logger = true, ...deps } = options;
  const app = Fastify({ logger });

  // Body parser failures (malformed or empty JSON) are bad input like any schema violation.
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    if (error.statusCode === 400 || error.code === "FST_ERR_CTP_EMPTY_JSON_BODY") {
      return reply.code(422).send({ error: "validation_error", message: error.message });
    }
    return reply.send(error);
  });

  registerAssessmentRoutes(app, deps);

  return app;
}

import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import {
  AlternativeRequestSchema,
  AlternativeResponseSchema,
  QuestionGenerationRequestSchema,
  QuestionGenerationResponseSchema,
  ScoreResponseSchema,
  SubmissionSchema,
  SWOTResponseSchema,
} from "@evalbridge/shared";
import type { PromptBudgets } from "../../config";
import { SchemaError, UpstreamError, ValidationError } from "../../errors";
import type { GenerationRequest, TextGenerator } from "../../providers/llmGateway";
import {
  normalizeAlternatives,
  normalizeEvaluation,
  normalizeGeneratedQuestions,
  normalizeSwot,
  type Normalized,
} from "./assessment.normalizer";
import {
  buildAlternativesPrompt,
  buildEvaluationPrompt,
  buildQuestionGenerationPrompt,
  buildSwotPrompt,
  type PromptSpec,
} from "./assessment.prompts";

export type AssessmentControllerDeps = {
  generator: TextGenerator;
  maxTokens: PromptBudgets;
  retryLimit: number;
};

const UPSTREAM_MESSAGE = "The language model service is unavailable. Try again later.";

// Aborts the model call when the client goes away before we reply.
function abortOnDisconnect(reply: FastifyReply) {
  const controller = new AbortController();
  reply.raw.once("close", () => {
    if (!reply.raw.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

function sendKnownError(request: FastifyRequest, reply: FastifyReply, err: unknown) {
  if (err instanceof z.ZodError) {
    return reply.code(422).send({ error: "validation_error", issues: err.issues });
  }
  if (err instanceof ValidationError) {
    return reply.code(422).send({ error: "validation_error", message: err.message, issues: err.issues });
  }
  if (err instanceof UpstreamError) {
    request.log.error({ kind: err.kind, status: err.status, reason: err.message }, "model call failed");
    return reply.code(err.kind === "rate_limited" ? 503 : 502).send({ error: "upstream_error", message: UPSTREAM_MESSAGE });
  }
  if (err instanceof SchemaError) {
    request.log.error({ reason: err.message }, "model returned no text");
    return reply.code(502).send({ error: "upstream_error", message: UPSTREAM_MESSAGE });
  }
  return undefined;
}

export function createAssessmentController(deps: AssessmentControllerDeps) {
  const { generator, maxTokens, retryLimit } = deps;

  // At most `retryLimit` extra attempts, and only for transient upstream failures.
  async function generateWithRetry(request: FastifyRequest, generation: GenerationRequest): Promise<string> {
    for (let attempt = 0; ; attempt += 1) {
      try {
        return await generator.generate(generation);
      } catch (err) {
        if (!(err instanceof UpstreamError) || !err.retryable || attempt >= retryLimit || generation.signal?.aborted) {
          throw err;
        }
        request.log.info({ kind: err.kind, attempt: attempt + 1 }, "retrying model call");
      }
    }
  }

  async function complete<T>(
    request: FastifyRequest,
    reply: FastifyReply,
    prompt: PromptSpec,
    normalize: (text: string) => Normalized<T>
  ) {
    const text = await generateWithRetry(request, {
      ...prompt,
      signal: abortOnDisconnect(reply),
    });
    const { value, fallbacks } = normalize(text);
    for (const fallback of fallbacks) {
      request.log.warn({ fallback }, "model output needed fallback");
    }
    return value;
  }

  return {
    async evaluate(request: FastifyRequest, reply: FastifyReply) {
      try {
        const submission = SubmissionSchema.parse(request.body);
        const result = await complete(request, reply, buildEvaluationPrompt(submission, maxTokens), (text) =>
          normalizeEvaluation(text, submission)
        );
        return reply.send(ScoreResponseSchema.parse(result));
      } catch (err) {
        const handled = sendKnownError(request, reply, err);
        if (handled) {
          return handled;
        }
        throw err;
      }
    },

    async swot(request: FastifyRequest, reply: FastifyReply) {
      try {
        const submission = SubmissionSchema.parse(request.body);
        const result = await complete(request, reply, buildSwotPrompt(submission, maxTokens), normalizeSwot);
        return reply.send(SWOTResponseSchema.parse(result));
      } catch (err) {
        const handled = sendKnownError(request, reply, err);
        if (handled) {
          return handled;
        }
        throw err;
      }
    },

    async generateQuestions(request: FastifyRequest, reply: FastifyReply) {
      try {
        const input = QuestionGenerationRequestSchema.parse(request.body);
        const result = await complete(
          request,
          reply,
          buildQuestionGenerationPrompt(input, maxTokens),
          (text) => normalizeGeneratedQuestions(text, input.count)
        );
        return reply.send(QuestionGenerationResponseSchema.parse(result));
      } catch (err) {
        const handled = sendKnownError(request, reply, err);
        if (handled) {
          return handled;
        }
        throw err;
      }
    },

    async generateAlternatives(request: FastifyRequest, reply: FastifyReply) {
      try {
        const input = AlternativeRequestSchema.parse(request.body);
        const result = await complete(
          request,
          reply,
          buildAlternativesPrompt(input, maxTokens),
          normalizeAlternatives
        );
        return reply.send(AlternativeResponseSchema.parse(result));
      } catch (err) {
        const handled = sendKnownError(request, reply, err);
        if (handled) {
          return handled;
        }
        throw err;
      }
    },

    async healthCheck(_request: FastifyRequest, reply: FastifyReply) {
      return reply.send({ status: "ok" });
    },
  };
}

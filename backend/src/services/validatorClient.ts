import { z } from "zod";
import { CollaboratorError, TransientCollaboratorError, errorMessage, isTransientStatus } from "../lib/errors.js";
import { VALIDATION_VERDICTS } from "../types/workflow.js";

const validationResponseSchema = z.object({
  verdict: z.enum(VALIDATION_VERDICTS),
  feedback: z.string().default(""),
  details: z
    .object({
      issues: z.array(z.string()).default([]),
    })
    .passthrough()
    .default({}),
});

const healthResponseSchema = z.object({
  status: z.string().default("ok"),
});

export type ValidationResponse = z.infer<typeof validationResponseSchema>;

export interface ValidationDocument {
  name: string;
  url: string;
  contentType: string;
}

export interface ValidationRequest {
  applicationId: string;
  studentId: string;
  studentName: string;
  documents: ValidationDocument[];
}

export interface ValidatorHealth {
  ok: boolean;
  status: string;
  latencyMs: number;
  error?: string;
}

export interface Validator {
  validate(request: ValidationRequest, signal?: AbortSignal): Promise<ValidationResponse>;
  health(timeoutMs: number): Promise<ValidatorHealth>;
}

const readBody = async (response: Response): Promise<unknown> => {
  try {
    return await response.json();
  } catch (error) {
    throw new CollaboratorError("validator", `Validator returned a non-JSON body: ${errorMessage(error)}`, response.status);
  }
};

export const createHttpValidator = (baseUrl: string): Validator => {
  const endpoint = (path: string): string => new URL(path, baseUrl).toString();

  const validate = async (request: ValidationRequest, signal?: AbortSignal): Promise<ValidationResponse> => {
    let response: Response;
    try {
      response = await fetch(endpoint("/validate"), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(request),
        signal,
      });
    } catch (error) {
      throw new TransientCollaboratorError("validator", `Validator request failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      const message = `Validator responded with HTTP ${response.status}`;
      if (isTransientStatus(response.status)) {
        throw new TransientCollaboratorError("validator", message, response.status);
      }
      throw new CollaboratorError("validator", message, response.status);
    }

    const parsed = validationResponseSchema.safeParse(await readBody(response));
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      throw new CollaboratorError("validator", `Validator payload is invalid: ${details}`, response.status);
    }
    return parsed.data;
  };

  const health = async (timeoutMs: number): Promise<ValidatorHealth> => {
    const startedAt = Date.now();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetch(endpoint("/health"), { signal: controller.signal });
      if (!response.ok) {
        return { ok: false, status: `http_${response.status}`, latencyMs: Date.now() - startedAt };
      }
      const parsed = healthResponseSchema.safeParse(await response.json());
      return {
        ok: true,
        status: parsed.success ? parsed.data.status : "ok",
        latencyMs: Date.now() - startedAt,
      };
    } catch (error) {
      return {
        ok: false,
        status: controller.signal.aborted ? "timeout" : "unreachable",
        latencyMs: Date.now() - startedAt,
        error: errorMessage(error),
      };
    } finally {
      clearTimeout(timeout);
    }
  };

  return { validate, health };
};

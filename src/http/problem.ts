import type { FieldError } from "../core/errors.js";

export type { FieldError };

export type ProblemCode =
  | "INVALID_ARGUMENT"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "FAILED_PRECONDITION"
  | "NOT_FOUND"
  | "INTERNAL";

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code: ProblemCode;
  requestId?: string;
  errors?: FieldError[];
}

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export function problem(params: Omit<Problem, "type" | "title">): Problem {
  const type = `https://errors.bayes-classifier.local/${params.code.toLowerCase().replace(/_/g, "-")}`;
  return {
    type,
    title: codeToTitle(params.code),
    status: params.status,
    detail: params.detail,
    instance: params.instance,
    code: params.code,
    requestId: params.requestId,
    errors: params.errors,
  };
}

function codeToTitle(code: ProblemCode): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "UNSUPPORTED_MEDIA_TYPE":
      return "Unsupported media type";
    case "FAILED_PRECONDITION":
      return "Failed precondition";
    case "NOT_FOUND":
      return "Not found";
    case "INTERNAL":
      return "Internal error";
  }
}

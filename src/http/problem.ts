export interface FieldError {
  path: string;
  message: string;
}

export type ProblemCode =
  | "INVALID_ARGUMENT"
  | "MALFORMED_JSON"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "NOT_FOUND"
  | "METHOD_NOT_ALLOWED"
  | "INTERNAL";

/** RFC 7807 problem document. */
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

const TITLES: Record<ProblemCode, string> = {
  INVALID_ARGUMENT: "Invalid argument",
  MALFORMED_JSON: "Malformed JSON",
  UNSUPPORTED_MEDIA_TYPE: "Unsupported media type",
  NOT_FOUND: "Not found",
  METHOD_NOT_ALLOWED: "Method not allowed",
  INTERNAL: "Internal error",
};

const STATUSES: Record<ProblemCode, number> = {
  INVALID_ARGUMENT: 400,
  MALFORMED_JSON: 400,
  UNSUPPORTED_MEDIA_TYPE: 415,
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  INTERNAL: 500,
};

export function problem(params: Omit<Problem, "type" | "title" | "status">): Problem {
  return {
    type: `https://errors.trie-lexicon.local/${params.code.toLowerCase().replace(/_/g, "-")}`,
    title: TITLES[params.code],
    status: STATUSES[params.code],
    detail: params.detail,
    instance: params.instance,
    code: params.code,
    requestId: params.requestId,
    errors: params.errors,
  };
}

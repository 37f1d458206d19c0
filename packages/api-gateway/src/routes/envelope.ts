export interface ApiError {
  code: string;
  message: string;
  stage?: string;
  subject?: string;
}

export function ok(data: unknown, requestId: string) {
  return { data, requestId };
}

export function fail(errors: ApiError[], requestId: string) {
  return { data: null, requestId, errors };
}

export function badRequest(message: string, requestId: string) {
  return fail([{ code: "BAD_REQUEST", message }], requestId);
}

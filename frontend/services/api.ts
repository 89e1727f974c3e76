// services/api.ts
import axios, { type AxiosInstance } from "axios";
import { zProblem, type ProblemBody } from "../../backend/services/shared/src/contracts/problem";

/** A failed call, with the server's problem+json body when it sent one. */
export class ApiError extends Error {
  public constructor(
    message: string,
    public readonly status: number | undefined,
    public readonly problem: ProblemBody | undefined,
    /** Seconds, from Retry-After on a 429. */
    public readonly retryAfter: number | undefined
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export function toApiError(err: unknown): ApiError {
  if (axios.isAxiosError(err) && err.response) {
    const { status, data, headers } = err.response;
    const parsed = zProblem.safeParse(data);
    const problem = parsed.success ? parsed.data : undefined;
    const raw: unknown = headers["retry-after"];
    const retryAfter = typeof raw === "string" ? Number(raw) : undefined;
    return new ApiError(
      problem?.detail ?? problem?.title ?? err.message,
      status,
      problem,
      retryAfter !== undefined && Number.isFinite(retryAfter) ? retryAfter : undefined
    );
  }
  return new ApiError(err instanceof Error ? err.message : String(err), undefined, undefined, undefined);
}

export type ApiOptions = {
  baseURL: string;
  /** Read on every request, so a token fetched later is picked up. */
  token?: () => string | undefined;
  timeoutMs?: number;
};

export function createApi(opts: ApiOptions): AxiosInstance {
  const api = axios.create({
    baseURL: opts.baseURL,
    timeout: opts.timeoutMs ?? 5000,
  });

  api.interceptors.request.use((config) => {
    const token = opts.token?.();
    if (token) config.headers.set("Authorization", `Bearer ${token}`);
    return config;
  });
  api.interceptors.response.use(undefined, (err: unknown) =>
    Promise.reject(toApiError(err))
  );

  return api;
}

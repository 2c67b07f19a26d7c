// server/services/http.ts
import axios, { type AxiosRequestConfig } from "axios";

/** The slice of axios the search clients use; tests pass an in-process fake. */
export interface HttpGetter {
  get(url: string, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
}

export const axiosGetter: HttpGetter = {
  get: (url, config) => axios.get<unknown>(url, config),
};

export const USER_AGENT = "Mozilla/5.0 (compatible; ResearchAgent/1.0)";

export function safeErr(e: unknown): string {
  if (e instanceof Error) return e.message;
  try {
    return JSON.stringify(e);
  } catch {
    return String(e);
  }
}

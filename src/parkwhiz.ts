import {
  AuthenticationError,
  NotFoundError,
  ParkWhizError,
  RateLimitError,
} from "./lib/errors";
import { fetchWithTimeout, isRecord, type FetchLike } from "./lib/http";

type Env = {
  baseUrl: string;
  timeoutMs: number;
  getAccessToken: () => Promise<string>;
  invalidateToken?: () => void;
  fetchImpl?: FetchLike;
};

const toProviderError = (status: number, data: unknown) => {
  if (status === 401) {
    return new AuthenticationError("ParkWhiz rejected the access token", { status, data });
  }
  if (status === 404) {
    return new NotFoundError("ParkWhiz resource not found", { data });
  }
  if (status === 429) {
    return new RateLimitError("ParkWhiz rate limit exceeded", { data });
  }
  return new ParkWhizError("ParkWhiz request failed", { status, data });
};

/** Bookings come back as a bare array or wrapped in `bookings` / `results`. */
export const unwrapBookings = (data: unknown): unknown[] => {
  if (Array.isArray(data)) {
    return data;
  }
  if (isRecord(data)) {
    if (Array.isArray(data.bookings)) {
      return data.bookings;
    }
    if (Array.isArray(data.results)) {
      return data.results;
    }
  }
  throw new ParkWhizError("ParkWhiz bookings response was not a list", { data });
};

export function createParkWhizClient(env: Env) {
  const fetchImpl = env.fetchImpl ?? fetch;

  async function getJson(path: string, params: Record<string, string> = {}) {
    const url = new URL(`${env.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    const accessToken = await env.getAccessToken();
    const { res, data } = await fetchWithTimeout(
      fetchImpl,
      url.toString(),
      {
        method: "GET",
        headers: {
          Authorization: `Bearer ${accessToken}`,
          Accept: "application/json",
        },
      },
      env.timeoutMs,
      `ParkWhiz GET ${path}`
    );
    if (!res.ok) {
      if (res.status === 401) {
        env.invalidateToken?.();
      }
      throw toProviderError(res.status, data);
    }
    return { data };
  }

  async function getCustomerBookings(query: { email: string; start_date: string; end_date: string }) {
    const { data } = await getJson("/bookings", {
      q: `customer_email:${query.email}`,
      start_date: query.start_date,
      end_date: query.end_date,
    });
    return unwrapBookings(data);
  }

  return { getJson, getCustomerBookings };
}

export type ParkWhizClient = ReturnType<typeof createParkWhizClient>;

import { AuthenticationError, ParkWhizError } from "./errors";
import { fetchWithTimeout, isRecord, type FetchLike } from "./http";

type TokenResponse = {
  access_token: string;
  expires_in?: number;
  token_type?: string;
};

export type ParkWhizTokenOptions = {
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  scope: string;
  timeoutMs: number;
  refreshMarginSeconds: number;
  fetchImpl?: FetchLike;
  now?: () => number;
};

// Tokens without expires_in are treated as valid for a year.
const DEFAULT_EXPIRES_IN_SECONDS = 31_557_600;

const parseTokenResponse = (data: unknown): TokenResponse | null => {
  if (!isRecord(data) || typeof data.access_token !== "string" || data.access_token === "") {
    return null;
  }
  return {
    access_token: data.access_token,
    expires_in: typeof data.expires_in === "number" ? data.expires_in : undefined,
    token_type: typeof data.token_type === "string" ? data.token_type : undefined,
  };
};

export const createParkWhizTokenProvider = (options: ParkWhizTokenOptions) => {
  const fetchImpl = options.fetchImpl ?? fetch;
  const now = options.now ?? Date.now;
  const tokenEndpoint = `${options.baseUrl}/oauth/token`;

  let cached: { accessToken: string; expiresAt: number; refreshMarginMs: number } | null = null;
  let refreshLock: Promise<string> | null = null;

  const exchangeToken = async () => {
    const body = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: options.clientId,
      client_secret: options.clientSecret,
      scope: options.scope,
    });
    const { res, data } = await fetchWithTimeout(
      fetchImpl,
      tokenEndpoint,
      {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded", Accept: "application/json" },
        body,
      },
      options.timeoutMs,
      "ParkWhiz token exchange"
    );
    if (res.status === 400 || res.status === 401 || res.status === 403) {
      throw new AuthenticationError("ParkWhiz token exchange rejected", { status: res.status, data });
    }
    if (!res.ok) {
      throw new ParkWhizError("ParkWhiz token exchange failed", { status: res.status, data });
    }
    const token = parseTokenResponse(data);
    if (!token) {
      throw new AuthenticationError("ParkWhiz token response missing access_token", { status: res.status, data });
    }
    return token;
  };

  const isFresh = (entry: { expiresAt: number; refreshMarginMs: number }) => entry.expiresAt - now() > entry.refreshMarginMs;

  const getAccessToken = async (): Promise<string> => {
    if (cached && isFresh(cached)) {
      return cached.accessToken;
    }
    if (refreshLock) {
      return refreshLock;
    }

    const refreshPromise = (async () => {
      const token = await exchangeToken();
      const lifetimeMs = (token.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS) * 1000;
      cached = {
        accessToken: token.access_token,
        expiresAt: now() + lifetimeMs,
        refreshMarginMs: Math.min(options.refreshMarginSeconds * 1000, lifetimeMs / 2),
      };
      return token.access_token;
    })();

    refreshLock = refreshPromise;
    try {
      return await refreshPromise;
    } finally {
      refreshLock = null;
    }
  };

  const invalidate = () => {
    cached = null;
  };

  return { getAccessToken, invalidate };
};

export type ParkWhizTokenProvider = ReturnType<typeof createParkWhizTokenProvider>;

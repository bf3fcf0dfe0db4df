type Env = Record<string, string | undefined>;

type RequireEnvResult =
  | { ok: true; values: Record<string, string> }
  | {
      ok: false;
      response: {
        ok: false;
        error_code: "MISSING_ENV";
        message: string;
        missing_keys: string[];
      };
    };

export const requireEnv = (keys: string[], env: Env = process.env): RequireEnvResult => {
  const values: Record<string, string> = {};
  const missing: string[] = [];
  for (const key of keys) {
    const value = env[key];
    if (value) {
      values[key] = value;
    } else {
      missing.push(key);
    }
  }

  if (missing.length > 0) {
    return {
      ok: false,
      response: {
        ok: false,
        error_code: "MISSING_ENV",
        message: `Missing env: ${missing.join(", ")}`,
        missing_keys: missing,
      },
    };
  }
  return { ok: true, values };
};

export const PRODUCTION_ENV_KEYS = ["PIPELINE_BEARER_TOKEN", "PARKWHIZ_CLIENT_ID", "PARKWHIZ_CLIENT_SECRET"];

export const requireProductionEnv = (env: Env = process.env) => requireEnv(PRODUCTION_ENV_KEYS, env);

import { ZodError, z } from "zod";

type ProcessEnv = Record<string, string | undefined>;

export const DEFAULT_FILTER_MAX_DEPTH = 32;

const normalizeOptionalString = (value: unknown): string | undefined => {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const optionalString = () =>
  z.preprocess((value) => normalizeOptionalString(value), z.string().optional());

const normalizedEnum = <T extends readonly [string, ...string[]]>(
  values: T,
  fallback: T[number]
) =>
  z.preprocess(
    (value) => normalizeOptionalString(value)?.toLowerCase() ?? fallback,
    z.enum(values)
  );

const positiveInt = (fallback: number) =>
  z.preprocess(
    (value) => normalizeOptionalString(value) ?? String(fallback),
    z.coerce.number().int().positive()
  );

const serverEnvSchema = z.object({
  ANALYTICS_CACHE_BACKEND: normalizedEnum(["memory", "postgres"], "memory"),
  ANALYTICS_DATABASE_URL: optionalString(),
  ANALYTICS_FILTER_MAX_DEPTH: positiveInt(DEFAULT_FILTER_MAX_DEPTH),
  ANALYTICS_SOURCE_MODE: normalizedEnum(["memory", "postgres"], "memory"),
  LOG_LEVEL: optionalString()
});

export type Env = z.infer<typeof serverEnvSchema>;

const ENV_KEYS = Object.keys(serverEnvSchema.shape);

let cachedEnv: Env | null = null;
let cachedSnapshot = "";

const buildEnvSnapshot = (rawEnv: ProcessEnv): string =>
  ENV_KEYS.map((key) => `${key}=${rawEnv[key] ?? ""}`).join("\n");

export const parseEnv = (rawEnv: ProcessEnv): Env => {
  try {
    return serverEnvSchema.parse(rawEnv);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new Error(`[env] Invalid environment configuration: ${details}`);
    }

    throw error;
  }
};

export const validateEnv = (): Env => {
  const snapshot = buildEnvSnapshot(process.env);
  if (cachedEnv && cachedSnapshot === snapshot) {
    return cachedEnv;
  }

  cachedEnv = parseEnv(process.env);
  cachedSnapshot = snapshot;
  return cachedEnv;
};

export const env = new Proxy({} as Env, {
  get(_target, prop: string | symbol): unknown {
    return Reflect.get(validateEnv(), prop);
  },
  has(_target, prop: string | symbol): boolean {
    return prop in validateEnv();
  },
  ownKeys(): ArrayLike<string | symbol> {
    return Reflect.ownKeys(validateEnv());
  },
  getOwnPropertyDescriptor(_target, prop: string | symbol): PropertyDescriptor | undefined {
    const resolved = validateEnv();
    if (!(prop in resolved)) {
      return undefined;
    }

    return {
      configurable: true,
      enumerable: true,
      writable: false,
      value: Reflect.get(resolved, prop)
    };
  }
});

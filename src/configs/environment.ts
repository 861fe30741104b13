import dotenv from "dotenv";
import { z } from "zod";
import { LLMProvider } from "../common/common-enum";
import { MESSAGES } from "../utils/constants";
import { ConfigError } from "../utils/errors";

dotenv.config();

const envSchema = z.object({
  PORT: z.string().regex(/^\d+$/, "PORT must be a number").optional(),
  NODE_ENV: z.string().optional(),

  LLM_PROVIDER: z.nativeEnum(LLMProvider).optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().optional(),

  ENABLE_SPORT_DETECTION: z.enum(["true", "false"]).optional(),

  LOG_LEVEL: z.string().optional(),
  ENABLE_FILE_LOG: z.string().optional(),

  RATE_LIMIT_WINDOW: z.string().optional(),
  RATE_LIMIT_MAX: z.string().optional(),
  CORS_ORIGIN: z.string().optional(),
});

export type AppConfig = ReturnType<typeof buildConfig>;

const parseProvider = (value: string | undefined): LLMProvider =>
  value === LLMProvider.GEMINI ? LLMProvider.GEMINI : LLMProvider.OPENAI;

const buildConfig = () => {
  const env = process.env;
  return {
    port: parseInt(env.PORT || "3000", 10),
    nodeEnv: env.NODE_ENV || "development",
    llm: {
      provider: parseProvider(env.LLM_PROVIDER),
      openai: {
        apiKey: env.OPENAI_API_KEY || "",
        model: env.OPENAI_MODEL || "gpt-4o-mini",
      },
      gemini: {
        apiKey: env.GEMINI_API_KEY || "",
        model: env.GEMINI_MODEL || "gemini-2.5-flash",
      },
    },
    features: {
      sportDetection: env.ENABLE_SPORT_DETECTION !== "false",
    },
    logging: {
      level: env.LOG_LEVEL || "info",
      enableFile: env.ENABLE_FILE_LOG === "true",
    },
    api: {
      rateLimit: {
        windowMs: parseInt(env.RATE_LIMIT_WINDOW || "60000", 10),
        max: parseInt(env.RATE_LIMIT_MAX || "60", 10),
      },
      cors: {
        origin: env.CORS_ORIGIN?.split(",") || ["http://localhost:3000"],
      },
    },
  };
};

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = buildConfig();
  }
  return cachedConfig;
};

/** Drops the cached config so the next `loadConfig` re-reads the environment. */
export const resetConfig = (): void => {
  cachedConfig = null;
};

export const credentialKeyFor = (provider: LLMProvider): string =>
  provider === LLMProvider.GEMINI ? "GEMINI_API_KEY" : "OPENAI_API_KEY";

export const validateConfig = (): AppConfig => {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }

  const config = loadConfig();
  const { provider } = config.llm;
  const apiKey =
    provider === LLMProvider.GEMINI
      ? config.llm.gemini.apiKey
      : config.llm.openai.apiKey;
  if (!apiKey) {
    throw new ConfigError(MESSAGES.MISSING_CREDENTIAL(credentialKeyFor(provider)));
  }
  return config;
};

import { z } from "zod";

// ============================================
// Environment configuration with validation
// Parsed once at startup; components receive the
// derived config through their constructors
// ============================================

const intFromEnv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) => Number(v))
    .pipe(z.number().int().positive());

const envSchema = z.object({
  // Server
  PORT: intFromEnv("3000"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  API_ALLOWED_ORIGINS: z.string().default(""), // Comma-separated origins, or "*" for all

  // OpenAI
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  CHAT_MODEL: z.string().default("gpt-4o-mini"),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_DIMENSIONS: intFromEnv("1536"),

  // Cross-encoder (optional - LLM relevance judge is used when unset)
  CROSS_ENCODER_URL: z.string().url("CROSS_ENCODER_URL must be a valid URL").optional(),

  // Supabase
  SUPABASE_URL: z.string().url("SUPABASE_URL must be a valid URL"),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, "SUPABASE_SERVICE_ROLE_KEY is required"),

  // Redis (optional - in-memory history when unset)
  REDIS_URL: z.string().optional(),
  CHAT_HISTORY_TTL_SECONDS: intFromEnv(String(60 * 60 * 24 * 7)), // 7 days
  CHAT_MAX_TURNS: intFromEnv("20"),
  HISTORY_WINDOW: intFromEnv("10"),

  // Retrieval
  TOP_K_DENSE: intFromEnv("20"),
  TOP_K_BM25: intFromEnv("20"),
  TOP_K_FINAL: intFromEnv("5"),
  MAX_CONTEXT_CHARS: intFromEnv("6000"),
});

export type Env = z.infer<typeof envSchema>;

export interface Config {
  port: number;
  isDev: boolean;
  isProd: boolean;
  allowedOrigins: string[];
  openai: {
    apiKey: string;
    chatModel: string;
    embeddingModel: string;
    embeddingDimensions: number;
  };
  crossEncoderUrl?: string;
  supabase: {
    url: string;
    serviceRoleKey: string;
  };
  memory: {
    redisUrl?: string;
    ttlSeconds: number;
    maxTurns: number;
  };
  historyWindow: number;
  retrieval: {
    topKDense: number;
    topKLexical: number;
    topKFinal: number;
    maxContextChars: number;
  };
}

/**
 * Parse allowed origins from environment variable.
 */
function parseAllowedOrigins(originsStr: string): string[] {
  if (!originsStr) return [];
  return originsStr.split(",").map((o) => o.trim()).filter(Boolean);
}

/**
 * Validate an environment map and derive the config.
 * Throws a ZodError listing every invalid variable.
 */
export function parseEnv(source: Record<string, string | undefined>): Config {
  // Empty strings count as unset
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== "")
  );
  const env = envSchema.parse(cleaned);

  return {
    port: env.PORT,
    isDev: env.NODE_ENV === "development",
    isProd: env.NODE_ENV === "production",
    allowedOrigins: parseAllowedOrigins(env.API_ALLOWED_ORIGINS),
    openai: {
      apiKey: env.OPENAI_API_KEY,
      chatModel: env.CHAT_MODEL,
      embeddingModel: env.EMBEDDING_MODEL,
      embeddingDimensions: env.EMBEDDING_DIMENSIONS,
    },
    crossEncoderUrl: env.CROSS_ENCODER_URL,
    supabase: {
      url: env.SUPABASE_URL,
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
    },
    memory: {
      redisUrl: env.REDIS_URL,
      ttlSeconds: env.CHAT_HISTORY_TTL_SECONDS,
      maxTurns: env.CHAT_MAX_TURNS,
    },
    historyWindow: env.HISTORY_WINDOW,
    retrieval: {
      topKDense: env.TOP_K_DENSE,
      topKLexical: env.TOP_K_BM25,
      topKFinal: env.TOP_K_FINAL,
      maxContextChars: env.MAX_CONTEXT_CHARS,
    },
  };
}

/**
 * Load config from process.env.
 * Fails fast on startup if config is invalid.
 */
export function loadConfig(): Config {
  try {
    return parseEnv(process.env);
  } catch (err) {
    console.error("❌ Invalid environment configuration:");
    if (err instanceof z.ZodError) {
      for (const issue of err.issues) {
        console.error(`   ${issue.path.join(".")}: ${issue.message}`);
      }
    } else {
      console.error(`   ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }
}

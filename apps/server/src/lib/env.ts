import z from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const thresholdSchema = z.coerce.number().min(0).max(1);

const serverEnvSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .optional(),
    DATABASE_PATH: z.string().min(1).default("./.data/kinship.db"),
    UPLOAD_DIR: z.string().min(1).default("./uploads"),
    AUTO_VERIFICATION_ENABLED: booleanFlag.default("true"),
    AUTO_APPROVE_THRESHOLD: thresholdSchema.default(0.65),
    AUTO_REJECT_THRESHOLD: thresholdSchema.default(0.35),
    MAX_UPLOAD_BYTES: z.coerce
      .number()
      .int()
      .positive()
      .default(10 * 1024 * 1024),
    OCR_LANGUAGES: z.string().min(1).default("eng+rus"),
    OCR_LANG_PATH: z.string().min(1).optional(),
    FACE_MODELS_PATH: z.string().min(1).optional(),
    // 200 dpi over the 72 dpi PDF user space
    PDF_RENDER_SCALE: z.coerce.number().positive().max(8).default(200 / 72),
    VERIFICATION_JOB_CONCURRENCY: z.coerce
      .number()
      .int()
      .min(1)
      .max(16)
      .default(2),
  })
  .refine((env) => env.AUTO_REJECT_THRESHOLD < env.AUTO_APPROVE_THRESHOLD, {
    message: "AUTO_REJECT_THRESHOLD must be lower than AUTO_APPROVE_THRESHOLD",
    path: ["AUTO_REJECT_THRESHOLD"],
  });

export type ServerConfig = z.infer<typeof serverEnvSchema>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid server configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Parse server settings from an environment map.
 * Empty strings count as unset so `.env` placeholders fall back to defaults.
 */
export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const input = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = serverEnvSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "env"}: ${issue.message}`,
      ),
    );
  }
  return parsed.data;
}

let cachedConfig: ServerConfig | null = null;

export function getServerConfig(): ServerConfig {
  if (!cachedConfig) {
    cachedConfig = loadServerConfig();
  }
  return cachedConfig;
}

import { z } from "zod";

const ENV_BOOLEAN_TRUE_VALUES = new Set(["1", "on", "true", "yes"]);
const ENV_BOOLEAN_FALSE_VALUES = new Set(["", "0", "false", "no", "off"]);
const ENV_BOOLEAN_ALLOWED_VALUES = "true, false, 1, 0, yes, no, on, off, or empty string";

function createEnvBooleanSchema(defaultValue: boolean): z.ZodType<boolean> {
  return z.string().optional().transform((rawValue, context) => {
    if (rawValue === undefined) {
      return defaultValue;
    }

    const normalized = rawValue.trim().toLowerCase();
    if (ENV_BOOLEAN_TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (ENV_BOOLEAN_FALSE_VALUES.has(normalized)) {
      return false;
    }

    context.addIssue({
      code: "custom",
      message: `Invalid boolean value "${rawValue}". Expected one of: ${ENV_BOOLEAN_ALLOWED_VALUES}.`,
    });
    return z.NEVER;
  });
}

export const envSchema = z.object({
  OPENROUTER_API_KEY: z.string().min(1).optional(),
  OPENROUTER_MODEL: z.string().min(1).default("openrouter/auto"),

  PLANLOOP_ATTEMPT_DEADLINE_MS: z.coerce.number().int().positive().default(120_000),
  PLANLOOP_DRY_RUN: createEnvBooleanSchema(false),
  PLANLOOP_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  PLANLOOP_MAX_CONSECUTIVE_PARSE_FAILURES: z.coerce.number().int().min(1).default(2),
  PLANLOOP_REQUIRE_STEP_APPROVAL: createEnvBooleanSchema(false),
  PLANLOOP_TOOL_OUTPUT_LIMIT_CHARS: z.coerce.number().int().positive().default(8000),
  PLANLOOP_TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  PLANLOOP_VERBOSE: createEnvBooleanSchema(false),
});

export type Environment = z.infer<typeof envSchema>;

export function parseEnvironment(input: Record<string, string | undefined>) {
  return envSchema.safeParse(input);
}

let cachedEnvironment: Environment | null = null;

export function getEnv(): Environment {
  if (cachedEnvironment) {
    return cachedEnvironment;
  }

  const parsed = parseEnvironment(process.env);
  if (!parsed.success) {
    console.error("❌ Invalid environment configuration:");
    console.error(z.treeifyError(parsed.error));
    process.exit(1);
  }

  cachedEnvironment = parsed.data;
  return cachedEnvironment;
}

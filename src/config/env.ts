import { z } from "zod";

/** Per-agent weight overrides supplied as a JSON object, e.g. {"coverage_agent":0.3} */
const weightOverridesSchema = z.record(z.string(), z.number().finite().nonnegative());

const envSchema = z.object({
  DATABASE_URL: z.string().default(""),
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Claim rows pulled per run
  DATASET_LIMIT: z.coerce.number().int().positive().default(10000),

  // Workers in the agent execution pool (capped at the number of agents)
  AGENT_POOL_SIZE: z.coerce.number().int().positive().default(5),

  SCORING_WEIGHTS: z
    .string()
    .optional()
    .transform((val, ctx) => {
      if (!val) return {};
      let parsed: unknown;
      try {
        parsed = JSON.parse(val);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON object" });
        return z.NEVER;
      }
      const result = weightOverridesSchema.safeParse(parsed);
      if (!result.success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "must map agent names to non-negative numbers",
        });
        return z.NEVER;
      }
      return result.data;
    }),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }

  return result.data;
}

export const env = loadEnv();

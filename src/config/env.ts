import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Database
  DATABASE_URL: z.string().url(),

  // Redis
  REDIS_URL: z.string().default("redis://localhost:6379"),

  // Slack (supervisor notifications)
  SLACK_WEBHOOK_URL: z.string().default(""),

  // Scoring automation
  AUTO_ASSIGN_THRESHOLD: z.coerce.number().int().min(0).max(100).default(80),
  QUALIFY_THRESHOLD: z.coerce.number().int().min(0).max(100).default(70),
  SCORING_AUTOMATION_INTERVAL_MINUTES: z.coerce.number().int().positive().default(60),
});

function loadEnv() {
  const parsed = envSchema.safeParse(process.env);

  if (!parsed.success) {
    const missing = parsed.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    console.error(`\n❌ Invalid environment variables:\n${missing}\n`);
    console.error("Copy .env.example to .env and fill in the values.");
    process.exit(1);
  }

  return parsed.data;
}

export const env = loadEnv();
export type Env = z.infer<typeof envSchema>;

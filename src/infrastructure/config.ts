import { z } from "zod";

const EnvironmentDto = z.object({
  MONGODB_URL: z.string({ required_error: "MONGODB_URL is not defined" }).min(1, "MONGODB_URL is not defined"),
  PORT: z.coerce.number().int().positive().default(8000),
  CORS_ORIGIN: z.string().min(1).optional(),
});

export type AppConfig = {
  mongodbUrl: string;
  port: number;
  corsOrigin?: string;
};

/**
 * Clerk reads CLERK_PUBLISHABLE_KEY, CLERK_SECRET_KEY and
 * CLERK_WEBHOOK_SIGNING_SECRET from the environment itself.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = EnvironmentDto.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration - ${problems}`);
  }

  return {
    mongodbUrl: result.data.MONGODB_URL,
    port: result.data.PORT,
    corsOrigin: result.data.CORS_ORIGIN,
  };
};

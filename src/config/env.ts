import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  // Read by the logger straight from process.env; any value passes here
  LOG_LEVEL: z.string().optional(),
  NODE_ENV: z.string().optional(),

  // Overrides the bundled templates/resume.html
  RESUME_TEMPLATE_PATH: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    console.error('Invalid environment variables:', result.error.flatten().fieldErrors);
    process.exit(1);
  }
  return result.data;
}

export const env = loadEnv();

import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

const cliEnvSchema = z.object({
  SWIMCUTS_API_URL: z.string().url().default('http://localhost:8787'),
  SWIMCUTS_HOME: z.string().min(1).optional(),
});

export interface CliConfig {
  apiUrl: string;
  homeDir: string;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = cliEnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid CLI configuration: ${issues.join('; ')}`);
  }
  return {
    apiUrl: parsed.data.SWIMCUTS_API_URL.replace(/\/$/, ''),
    homeDir: parsed.data.SWIMCUTS_HOME ?? path.join(os.homedir(), '.swimcuts'),
  };
}

import { z } from 'zod';

const ClientConfigSchema = z.object({
  GATEWAY_URL: z.string().url().default('http://localhost:8099'),
  GATEWAY_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),
});

export interface ClientConfig {
  baseUrl: string;
  timeoutMs: number;
}

export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = ClientConfigSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid client configuration: ${issues.join('; ')}`);
  }
  return { baseUrl: parsed.data.GATEWAY_URL, timeoutMs: parsed.data.GATEWAY_TIMEOUT_MS };
}

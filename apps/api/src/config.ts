export interface AppConfig {
  port: number;
  /** Bearer token for /api/v1; auth is off when unset. */
  apiKey: string | undefined;
  /** Currency used for the *Formatted fields unless a request names one. */
  currency: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parseInt(env.PORT ?? '3000', 10),
    apiKey: env.FINPLAN_API_KEY || undefined,
    currency: env.FINPLAN_CURRENCY ?? 'USD',
  };
}

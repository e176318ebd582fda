import { createApp } from '../src/app.js';
import type { AppConfig } from '../src/config.js';

export type App = ReturnType<typeof createApp>;

export const testConfig: AppConfig = { port: 0, apiKey: undefined, currency: 'USD' };

export async function api(
  app: App,
  method: string,
  path: string,
  body?: unknown,
  headers: Record<string, string> = {},
) {
  const init: RequestInit = {
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
  };
  if (body !== undefined) init.body = typeof body === 'string' ? body : JSON.stringify(body);
  const res = await app.request(path, init);
  return { status: res.status, data: await res.json() };
}

import { describe, it, expect } from 'vitest';
import { createApp } from '../src/app.js';
import { loadConfig } from '../src/config.js';
import { api, testConfig } from './helpers.js';

describe('API', () => {
  it('reports health', async () => {
    const app = createApp(testConfig);
    const { status, data } = await api(app, 'GET', '/health');

    expect(status).toBe(200);
    expect(data).toEqual({ status: 'ok', version: '0.1.0' });
  });

  it('rejects a body that is not JSON', async () => {
    const app = createApp(testConfig);
    const { status, data } = await api(app, 'POST', '/api/v1/savings/goal', '{not json');

    expect(status).toBe(400);
    expect(data.error.code).toBe('VALIDATION_ERROR');
    expect(data.error.message).toBe('Request body must be valid JSON');
  });

  describe('API key auth', () => {
    const app = createApp({ ...testConfig, apiKey: 'test-secret' });
    const body = { initialPrincipal: 10000, periodicContribution: 0, periodicRate: 0.05, targetAmount: 5000 };

    it('requires the Authorization header', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/savings/goal', body);

      expect(status).toBe(401);
      expect(data.error.code).toBe('UNAUTHORIZED');
      expect(data.error.message).toBe('Missing Authorization header');
    });

    it('rejects a wrong key', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/savings/goal', body, {
        Authorization: 'Bearer wrong',
      });

      expect(status).toBe(401);
      expect(data.error.message).toBe('Invalid API key');
    });

    it('rejects the key without a Bearer scheme', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/savings/goal', body, {
        Authorization: 'test-secret',
      });

      expect(status).toBe(401);
      expect(data.error.suggestion).toBe('Compare the key with FINPLAN_API_KEY on the server');
    });

    it('accepts the configured key', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/savings/goal', body, {
        Authorization: 'Bearer test-secret',
      });

      expect(status).toBe(200);
      expect(data.time).toBe(0);
    });

    it('leaves /health open', async () => {
      const { status } = await api(app, 'GET', '/health');
      expect(status).toBe(200);
    });
  });
});

describe('loadConfig', () => {
  it('reads port, key and currency from the environment', () => {
    expect(loadConfig({ PORT: '8080', FINPLAN_API_KEY: 'test-secret', FINPLAN_CURRENCY: 'EUR' })).toEqual({
      port: 8080,
      apiKey: 'test-secret',
      currency: 'EUR',
    });
  });

  it('falls back to defaults and treats an empty key as unset', () => {
    expect(loadConfig({ FINPLAN_API_KEY: '' })).toEqual({ port: 3000, apiKey: undefined, currency: 'USD' });
  });
});

import { test } from 'node:test';
import * as assert from 'node:assert';
import { ConfigError, loadConfig, toSessionManagerConfig } from './index.js';

const CREDENTIALS = { VINNUSTUND_USERNAME: 'test-user', VINNUSTUND_PASSWORD: 'test-secret' };

test('applies defaults when only credentials are set', () => {
  assert.deepStrictEqual(loadConfig(CREDENTIALS), {
    credentials: { username: 'test-user', password: 'test-secret' },
    baseUrl: 'https://kopavogur.vinnustund.is',
    refreshAutomatically: false,
    automaticRefreshPeriodHours: 4,
    keepAliveEnabled: false,
    keepAliveIntervalMinutes: 10,
    requestTimeoutMs: 30000,
    requestDelay: { minMs: 1000, maxMs: 2000 },
    port: 5000,
    logLevel: undefined
  });
});

test('reads every setting from the environment', () => {
  const config = loadConfig({
    ...CREDENTIALS,
    VINNUSTUND_BASE_URL: 'https://portal.example.com',
    REFRESH_AUTOMATICALLY: 'True',
    AUTOMATIC_REFRESH_PERIOD_HOURS: '0.5',
    KEEP_ALIVE_ENABLED: '1',
    KEEP_ALIVE_INTERVAL_MINUTES: '2.5',
    REQUEST_TIMEOUT_MS: '1500',
    REQUEST_DELAY_MIN_MS: '0',
    REQUEST_DELAY_MAX_MS: '0',
    PORT: '8080',
    LOG_LEVEL: 'DEBUG'
  });

  assert.strictEqual(config.baseUrl, 'https://portal.example.com');
  assert.strictEqual(config.refreshAutomatically, true);
  assert.strictEqual(config.automaticRefreshPeriodHours, 0.5);
  assert.strictEqual(config.keepAliveEnabled, true);
  assert.strictEqual(config.keepAliveIntervalMinutes, 2.5);
  assert.strictEqual(config.requestTimeoutMs, 1500);
  assert.deepStrictEqual(config.requestDelay, { minMs: 0, maxMs: 0 });
  assert.strictEqual(config.port, 8080);
  assert.strictEqual(config.logLevel, 'debug');
});

test('missing credentials are reported together', () => {
  assert.throws(() => loadConfig({ VINNUSTUND_USERNAME: 'test-user' }), (error: unknown) => {
    assert.ok(error instanceof ConfigError);
    assert.deepStrictEqual(error.missing, ['VINNUSTUND_PASSWORD']);
    return true;
  });
  assert.throws(() => loadConfig({}), {
    message: 'Missing required env vars: VINNUSTUND_USERNAME, VINNUSTUND_PASSWORD'
  });
});

test('rejects values that do not parse', () => {
  assert.throws(() => loadConfig({ ...CREDENTIALS, REFRESH_AUTOMATICALLY: 'maybe' }), {
    message: 'Invalid boolean for REFRESH_AUTOMATICALLY: "maybe"'
  });
  assert.throws(() => loadConfig({ ...CREDENTIALS, AUTOMATIC_REFRESH_PERIOD_HOURS: 'four' }), {
    message: 'Invalid number for AUTOMATIC_REFRESH_PERIOD_HOURS: "four"'
  });
  assert.throws(() => loadConfig({ ...CREDENTIALS, KEEP_ALIVE_INTERVAL_MINUTES: '0' }), {
    message: 'KEEP_ALIVE_INTERVAL_MINUTES must be greater than 0'
  });
  assert.throws(() => loadConfig({ ...CREDENTIALS, REQUEST_DELAY_MIN_MS: '500', REQUEST_DELAY_MAX_MS: '100' }), {
    message: 'REQUEST_DELAY_MAX_MS must not be below REQUEST_DELAY_MIN_MS'
  });
  assert.throws(() => loadConfig({ ...CREDENTIALS, LOG_LEVEL: 'verbose' }), {
    message: 'Invalid LOG_LEVEL "verbose"'
  });
});

test('converts periods to milliseconds for the session manager', () => {
  const config = loadConfig({
    ...CREDENTIALS,
    REFRESH_AUTOMATICALLY: 'true',
    AUTOMATIC_REFRESH_PERIOD_HOURS: '2',
    KEEP_ALIVE_INTERVAL_MINUTES: '5'
  });

  const sessionConfig = toSessionManagerConfig(config);

  assert.strictEqual(sessionConfig.refreshAutomatically, true);
  assert.strictEqual(sessionConfig.automaticRefreshPeriodMs, 7_200_000);
  assert.strictEqual(sessionConfig.keepAlive, false);
  assert.strictEqual(sessionConfig.keepAliveIntervalMs, 300_000);
  assert.strictEqual(sessionConfig.timeout, 30000);
  assert.strictEqual(sessionConfig.baseUrl, 'https://kopavogur.vinnustund.is');
});

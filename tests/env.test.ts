/**
 * @jest-environment node
 */
import path from 'node:path';

// keep a developer's .env out of the test
jest.mock('dotenv', () => ({ config: jest.fn() }));

const WAKE_VARS = [
  'PICOVOICE_ACCESS_KEY',
  'WAKE_URI',
  'WAKE_DATA_DIR',
  'WAKE_SYSTEM',
  'WAKE_SENSITIVITY',
  'WAKE_DEFAULT_KEYWORD',
  'DEBUG_MODE',
];

// (re)load the module with controlled env/argv
const loadEnvModule = (opts?: { env?: Record<string, string>; argv?: string[] }) => {
  const originalEnv = process.env;
  const originalArgv = process.argv;

  process.env = { ...originalEnv };
  for (const key of WAKE_VARS) delete process.env[key];
  Object.assign(process.env, opts?.env ?? {});
  process.argv = [process.execPath, path.join(process.cwd(), 'fake-script.js'), ...(opts?.argv ?? [])];

  jest.resetModules();
  const mod: typeof import('../src/env') = require('../src/env');

  process.env = originalEnv;
  process.argv = originalArgv;
  return mod;
};

describe('env.ts', () => {
  test('defaults when nothing is set', () => {
    const mod = loadEnvModule();

    expect(mod.SERVER_URI).toBe('stdio://');
    expect(mod.PICOVOICE_ACCESS_KEY).toBeUndefined();
    expect(mod.SENSITIVITY).toBeUndefined();
    expect(mod.DEBUG_MODE).toBe(false);
    expect(mod.CUSTOM_KEYWORD_DIRS).toEqual([]);
    expect(mod.CONFIG_PATH).toBeUndefined();
    expect(mod.LOG_FILE).toBeUndefined();
  });

  test('reads environment variables', () => {
    const mod = loadEnvModule({
      env: {
        PICOVOICE_ACCESS_KEY: 'test-key',
        WAKE_URI: 'tcp://0.0.0.0:10400',
        WAKE_DATA_DIR: '/srv/wake',
        WAKE_SYSTEM: 'raspberry-pi',
        WAKE_SENSITIVITY: '0.65',
        WAKE_DEFAULT_KEYWORD: 'ok home',
        DEBUG_MODE: 'true',
      },
    });

    expect(mod.PICOVOICE_ACCESS_KEY).toBe('test-key');
    expect(mod.SERVER_URI).toBe('tcp://0.0.0.0:10400');
    expect(mod.DATA_DIR).toBe('/srv/wake');
    expect(mod.SYSTEM).toBe('raspberry-pi');
    expect(mod.SENSITIVITY).toBe(0.65);
    expect(mod.DEFAULT_KEYWORD_NAME).toBe('ok home');
    expect(mod.DEBUG_MODE).toBe(true);
  });

  test('CLI flags override the environment', () => {
    const mod = loadEnvModule({
      env: { PICOVOICE_ACCESS_KEY: 'env-key', WAKE_URI: 'stdio://', WAKE_SENSITIVITY: '0.1' },
      argv: [
        '--access-key', 'test-key',
        '--uri', 'unix:///tmp/wake.sock',
        '--sensitivity', '0.8',
        '--data-dir', './data',
        '--system', 'linux',
        '--default-keyword', 'porcupine',
        '--custom-keyword-dir', '/a',
        '--custom-keyword-dir', '/b',
        '--config', './conf/wake.json',
        '--log-file', './run.log',
      ],
    });

    expect(mod.PICOVOICE_ACCESS_KEY).toBe('test-key');
    expect(mod.SERVER_URI).toBe('unix:///tmp/wake.sock');
    expect(mod.SENSITIVITY).toBe(0.8);
    expect(mod.DATA_DIR).toBe('./data');
    expect(mod.SYSTEM).toBe('linux');
    expect(mod.DEFAULT_KEYWORD_NAME).toBe('porcupine');
    expect(mod.CUSTOM_KEYWORD_DIRS).toEqual(['/a', '/b']);
    expect(mod.CONFIG_PATH).toBe('./conf/wake.json');
    expect(mod.LOG_FILE).toBe('./run.log');
  });

  test('DEBUG_MODE precedence: env then CLI (last wins)', () => {
    expect(loadEnvModule({ env: { DEBUG_MODE: 'false' }, argv: ['--debug'] }).DEBUG_MODE).toBe(true);
    expect(loadEnvModule({ env: { DEBUG_MODE: 'true' }, argv: ['--no-debug'] }).DEBUG_MODE).toBe(false);
    expect(loadEnvModule({ argv: ['--debug', '--no-debug'] }).DEBUG_MODE).toBe(false);
  });

  test('a flag without a value and unknown args are ignored', () => {
    const mod = loadEnvModule({ argv: ['--wat', 'lol', '--uri'] });

    expect(mod.SERVER_URI).toBe('stdio://');
    expect(mod.CONFIG_PATH).toBeUndefined();
  });
});

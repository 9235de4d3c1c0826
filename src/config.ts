import { DEFAULT_TIMEOUT_MS, ENV_VARS, MAX_TIMEOUT_MS } from './constants.js';
import { ConfigurationError } from './errors.js';
import type { Config, InterpreterName } from './types.js';

type Env = Record<string, string | undefined>;

const INTERPRETERS: readonly InterpreterName[] = ['marker', 'jsonp'];

const invalidConfig = (name: string, expectation: string): ConfigurationError =>
    new ConfigurationError(name, `Environment variable '${name}' ${expectation}.`);

const parseIntegerEnv = (env: Env, name: string, defaultValue: number, min: number, max: number): number => {
    const raw = env[name];
    if (raw === undefined) return defaultValue;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed)) {
        throw invalidConfig(name, 'must be an integer');
    }
    if (parsed < min || parsed > max) {
        throw invalidConfig(name, `must be between ${min} and ${max}`);
    }
    return parsed;
};

const parseBooleanEnv = (env: Env, name: string, defaultValue: boolean): boolean => {
    const raw = env[name];
    if (raw === undefined) return defaultValue;
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;
    throw invalidConfig(name, 'must be a boolean (true/false/1/0)');
};

const isInterpreterName = (value: string): value is InterpreterName =>
    INTERPRETERS.some((name) => name === value);

const parseInterpreterEnv = (env: Env, name: string): InterpreterName => {
    const raw = env[name];
    if (raw === undefined) return 'marker';
    const value = raw.trim().toLowerCase();
    if (!isInterpreterName(value)) {
        throw invalidConfig(name, `must be one of ${INTERPRETERS.join(', ')}`);
    }
    return value;
};

/**
 * Builds the run configuration from the environment. Secrets are copied as they are
 * and only asserted by the component that needs them (see {@link requireSetting}).
 */
export const loadConfig = (env: Env = process.env): Config => ({
    username: env[ENV_VARS.username],
    password: env[ENV_VARS.password],
    topicArn: env[ENV_VARS.topic],
    timeoutMillis: parseIntegerEnv(env, ENV_VARS.timeout, DEFAULT_TIMEOUT_MS, 1, MAX_TIMEOUT_MS),
    interpreter: parseInterpreterEnv(env, ENV_VARS.interpreter),
    encodeCredentials: parseBooleanEnv(env, ENV_VARS.encodeCredentials, false),
});

export const requireSetting = (value: string | undefined, variable: string): string => {
    if (value === undefined) throw new ConfigurationError(variable);
    return value;
};

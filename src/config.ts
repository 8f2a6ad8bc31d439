import { config as loadDotenv } from 'dotenv';
import { ConfigError } from './errors.js';

loadDotenv();

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/47.0.2526.73 Safari/537.36';

export interface LibrusConfig {
  baseUrl: string;
  authUrl: string;
  loginUrl: string;
  twoFaUrl: string;
  userAgent: string;
  requestTimeoutMs: number;
  logLevel: string;
}

export interface Credentials {
  login: string;
  password: string;
}

const parseNumber = (value: string | undefined, fallback: number) => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
};

export function loadConfig(source: NodeJS.ProcessEnv = process.env): LibrusConfig {
  return {
    baseUrl: source.LIBRUS_BASE_URL ?? 'https://synergia.librus.pl',
    authUrl:
      source.LIBRUS_AUTH_URL ??
      'https://api.librus.pl/OAuth/Authorization?client_id=46&response_type=code&scope=mydata',
    loginUrl: source.LIBRUS_LOGIN_URL ?? 'https://api.librus.pl/OAuth/Authorization?client_id=46',
    twoFaUrl: source.LIBRUS_TWO_FA_URL ?? 'https://api.librus.pl/OAuth/Authorization/2FA?client_id=46',
    userAgent: source.LIBRUS_USER_AGENT ?? DEFAULT_USER_AGENT,
    requestTimeoutMs: parseNumber(source.REQUEST_TIMEOUT_MS, 30000),
    logLevel: source.LOG_LEVEL ?? 'ERROR',
  };
}

export function requireCredentials(source: NodeJS.ProcessEnv = process.env): Credentials {
  const login = source.LIBRUS_LOGIN;
  const password = source.LIBRUS_PASSWORD;
  if (!login) {
    throw new ConfigError('Missing required env var: LIBRUS_LOGIN');
  }
  if (!password) {
    throw new ConfigError('Missing required env var: LIBRUS_PASSWORD');
  }
  return { login, password };
}

export const LOGIN_ACTION = 'login';

export const env: Readonly<LibrusConfig> = Object.freeze(loadConfig());

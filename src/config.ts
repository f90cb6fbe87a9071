import pino from 'pino';

// Env configuration; CLI flags override these per invocation.
// CERTLENS_LOG_LEVEL   pino level for diagnostics on stderr (default warn)
// CERTLENS_OPENSSL     introspection binary (default openssl on PATH)
// CERTLENS_TIMEZONE    IANA zone used to display renewal instants (default Asia/Tokyo)
// CERTLENS_RENEW_DAYS  renewal lead time in days (default 30)

export interface AppConfig {
  logLevel: string;
  openssl: string;
  timeZone: string;
  renewDays: number;
}

export const DEFAULT_TIME_ZONE = 'Asia/Tokyo';
export const DEFAULT_LOG_LEVEL = 'warn';
export const DEFAULT_RENEW_DAYS = 30;
// A century; larger lead times push nextRenewal outside the Date range.
export const MAX_RENEW_DAYS = 36500;
export const DEFAULT_INDENT_WIDTH = 2;

function logLevel(value: string | undefined): string {
  if (!value) return DEFAULT_LOG_LEVEL;
  return value === 'silent' || Object.hasOwn(pino.levels.values, value) ? value : DEFAULT_LOG_LEVEL;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const renewDays = /^\d+$/.test(env.CERTLENS_RENEW_DAYS || '') ? parseInt(env.CERTLENS_RENEW_DAYS || '', 10) : NaN;
  return {
    logLevel: logLevel(env.CERTLENS_LOG_LEVEL),
    openssl: env.CERTLENS_OPENSSL || 'openssl',
    timeZone: env.CERTLENS_TIMEZONE || DEFAULT_TIME_ZONE,
    renewDays: Number.isInteger(renewDays) && renewDays <= MAX_RENEW_DAYS ? renewDays : DEFAULT_RENEW_DAYS,
  };
}

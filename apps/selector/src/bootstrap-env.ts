import { Logger } from '@nestjs/common';
import {
  applyFileBackedEnv,
  type SelectorSettings,
} from './settings/selector-settings';

type EnvLike = Record<string, string | undefined>;

/** Env-level setup that must happen before settings are read. */
export function ensureBootstrapEnv(env: EnvLike = process.env): void {
  // Docker/Kubernetes-style indirection, e.g. PLEX_TOKEN_FILE.
  applyFileBackedEnv(env);
}

/**
 * Global fetch has no per-request TLS switch, so PLEX_SSL_VERIFY=false
 * relaxes verification for the whole (short-lived) process.
 */
export function applyTlsPolicy(
  settings: SelectorSettings,
  env: EnvLike = process.env,
): void {
  if (settings.backend !== 'api' || settings.plex.sslVerify) return;
  env.NODE_TLS_REJECT_UNAUTHORIZED = '0';
  new Logger('Bootstrap').warn(
    'PLEX_SSL_VERIFY is off: TLS certificates are not verified',
  );
}

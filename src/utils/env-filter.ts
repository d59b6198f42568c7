/**
 * Ambient environment handling
 *
 * The host environment is the lowest env layer a step sees. Sensitive variables and the
 * variables that carry secrets for the run are removed first, so a secret only reaches a
 * step through an explicit `${{ secrets.NAME }}` reference.
 */

export const SENSITIVE_ENV_PATTERNS = [
  /^.*_(API_KEY|SECRET|TOKEN|PASSWORD|CREDENTIAL|PRIVATE_KEY)(_.*)?$/i,
  /^(API_KEY|AUTH_TOKEN|SECRET_KEY|PRIVATE_KEY|PASSWORD|CREDENTIALS?)(_.*)?$/i,
  /^(AWS_SECRET|GITHUB_TOKEN|NPM_TOKEN|SSH_KEY|PGP_PASSPHRASE)(_.*)?$/i,
  /^.*_AUTH_(TOKEN|KEY|SECRET)(_.*)?$/i,
  /^(COOKIE|SESSION_ID|SESSION_SECRET)(_.*)?$/i,
];

export function isSensitiveEnvKey(key: string): boolean {
  return SENSITIVE_ENV_PATTERNS.some((pattern) => pattern.test(key));
}

export interface AmbientEnvOptions {
  /** Variables starting with this prefix hold run secrets and are never inherited */
  secretPrefix?: string;
  /** Keys to keep even if they look sensitive */
  allow?: string[];
}

/**
 * Build the ambient env layer from a host environment object (typically process.env).
 */
export function buildAmbientEnv(
  env: Record<string, string | undefined>,
  options: AmbientEnvOptions = {}
): Record<string, string> {
  const allow = new Set(options.allow ?? []);
  const filtered: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue;
    if (options.secretPrefix && key.startsWith(options.secretPrefix)) continue;
    if (isSensitiveEnvKey(key) && !allow.has(key)) continue;
    filtered[key] = value;
  }
  return filtered;
}

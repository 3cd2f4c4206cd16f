// =============================================================================
// COURSEWORK — Credential Strength Policy
// =============================================================================

const COMMON_PASSWORDS = new Set([
  'password',
  'password1',
  'password123',
  '12345678',
  '123456789',
  'qwerty123',
  'qwertyuiop',
  'letmein1',
  'iloveyou',
  'welcome1',
  'admin123',
  'abc12345',
]);

export interface CredentialPolicy {
  minLength: number;
}

export const DEFAULT_CREDENTIAL_POLICY: CredentialPolicy = { minLength: 8 };

/**
 * Every reason the password is too weak. Empty when it passes.
 */
export function credentialWeaknesses(
  password: string,
  username: string,
  policy: CredentialPolicy = DEFAULT_CREDENTIAL_POLICY,
): string[] {
  const reasons: string[] = [];

  if (password.length < policy.minLength) {
    reasons.push(`This password is too short. It must contain at least ${policy.minLength} characters.`);
  }
  if (/^\d+$/.test(password)) {
    reasons.push('This password is entirely numeric.');
  }
  const name = username.trim().toLowerCase();
  if (name.length >= 3 && password.toLowerCase().includes(name)) {
    reasons.push('The password is too similar to the username.');
  }
  if (COMMON_PASSWORDS.has(password.toLowerCase())) {
    reasons.push('This password is too common.');
  }

  return reasons;
}

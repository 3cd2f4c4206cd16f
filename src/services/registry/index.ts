// =============================================================================
// COURSEWORK — Principal & Role Registry
//
// Accounts, password checks and role assignment. Every operation writes
// to the principal store only after it has fully succeeded.
// =============================================================================

import bcrypt from 'bcryptjs';
import { requireOperation } from '../../authorization/guard';
import { InvalidCredentials, NotFound, WeakCredential } from '../../errors';
import { RawFields } from '../../types/pipeline';
import { Principal, PrincipalRecord } from '../../types/records';
import { Role } from '../../types/roles';
import { PrincipalStore } from '../../types/store';
import { AuditTrail } from '../audit';
import { DISPLAY_NAME_MAX_LENGTH, registrationForm, roleChangeForm } from '../pipeline/forms';
import { validateOrThrow } from '../pipeline/validate';
import {
  CredentialPolicy,
  DEFAULT_CREDENTIAL_POLICY,
  credentialWeaknesses,
} from './credential-policy';

export { credentialWeaknesses } from './credential-policy';
export type { CredentialPolicy } from './credential-policy';
export { issueToken, verifyToken } from './tokens';
export type { TokenSettings } from './tokens';

export interface Credentials {
  username: string;
  password: string;
}

export interface RegistryOptions {
  bcryptRounds: number;
  policy: CredentialPolicy;
}

interface NewAccount {
  username: string;
  password: string;
  email: string;
  displayName: string;
  role: Role;
}

/** Strip the password hash before a principal leaves the registry */
export function toPrincipal(record: PrincipalRecord): Principal {
  return {
    id: record.id,
    credentialRef: record.credentialRef,
    role: record.role,
    displayName: record.displayName,
    email: record.email,
    createdAt: record.createdAt,
  };
}

/** Usernames may be longer than a display name */
function defaultDisplayName(username: string): string {
  return username.slice(0, DISPLAY_NAME_MAX_LENGTH);
}

export class PrincipalRegistry {
  private readonly options: RegistryOptions;

  constructor(
    private readonly principals: PrincipalStore,
    private readonly audit: AuditTrail,
    options: Partial<RegistryOptions> = {},
  ) {
    this.options = {
      bcryptRounds: options.bcryptRounds ?? 12,
      policy: options.policy ?? DEFAULT_CREDENTIAL_POLICY,
    };
  }

  /**
   * Self-service registration. Only teacher and student may be chosen
   * here; admins come from the bootstrap account or a role change.
   */
  async register(raw: RawFields): Promise<Principal> {
    const draft = await validateOrThrow(registrationForm, raw);
    const principal = await this.createAccount({
      username: draft.username,
      password: draft.password1,
      email: draft.email,
      displayName: draft.displayName || defaultDisplayName(draft.username),
      role: draft.role,
    });

    await this.audit.record({
      eventType: 'principal.register',
      description: `Registered ${principal.credentialRef} as ${principal.role}`,
      actor: principal,
      targetType: 'principal',
      targetId: principal.id,
    });
    return principal;
  }

  async authenticate(credentials: Credentials): Promise<Principal> {
    const record = await this.principals.findByCredentialRef(credentials.username.trim());
    if (!record) {
      throw new InvalidCredentials();
    }
    const valid = await bcrypt.compare(credentials.password, record.passwordHash);
    if (!valid) {
      throw new InvalidCredentials();
    }
    return toPrincipal(record);
  }

  async assignRole(actor: Principal, targetId: string, raw: RawFields): Promise<Principal> {
    requireOperation(actor, 'principal.assignRole');
    const { role } = await validateOrThrow(roleChangeForm, raw);

    const existing = await this.principals.findById(targetId);
    if (!existing) {
      throw new NotFound('User');
    }
    const updated = await this.principals.updateRole(targetId, role);
    if (!updated) {
      throw new NotFound('User');
    }

    await this.audit.record({
      eventType: 'principal.role_change',
      description: `Role of ${updated.credentialRef} changed from ${existing.role} to ${role}`,
      actor,
      targetType: 'principal',
      targetId,
      metadata: { from: existing.role, to: role },
    });
    return toPrincipal(updated);
  }

  async findById(id: string): Promise<Principal | null> {
    const record = await this.principals.findById(id);
    return record ? toPrincipal(record) : null;
  }

  async list(actor: Principal): Promise<Principal[]> {
    requireOperation(actor, 'principal.list');
    const records = await this.principals.list();
    return records.map(toPrincipal);
  }

  /**
   * Create the configured admin account at start-up if it is missing.
   * Returns null when it already exists.
   */
  async ensureBootstrapAdmin(username: string, password: string): Promise<Principal | null> {
    const existing = await this.principals.findByCredentialRef(username);
    if (existing) return null;

    const principal = await this.createAccount({
      username,
      password,
      email: '',
      displayName: defaultDisplayName(username),
      role: 'admin',
    });
    console.log(`[Auth] Bootstrap admin "${username}" created`);
    return principal;
  }

  private async createAccount(account: NewAccount): Promise<Principal> {
    const reasons = credentialWeaknesses(account.password, account.username, this.options.policy);
    if (reasons.length > 0) {
      throw new WeakCredential(reasons);
    }

    const passwordHash = await bcrypt.hash(account.password, this.options.bcryptRounds);
    const record = await this.principals.insert({
      credentialRef: account.username,
      passwordHash,
      role: account.role,
      displayName: account.displayName,
      email: account.email,
    });
    return toPrincipal(record);
  }
}

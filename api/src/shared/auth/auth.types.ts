export const USER_ROLES = ['admin', 'editor', 'viewer'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export function isUserRole(value: unknown): value is UserRole {
  return typeof value === 'string' && (USER_ROLES as readonly string[]).includes(value);
}

/**
 * Authenticated caller, rebuilt from the access token on every request and
 * dropped with the response.
 */
export type Principal = Readonly<{
  userId: string;
  tenantId: string;
  role: UserRole;
}>;

export type TokenKind = 'access' | 'refresh';

export type AccessTokenClaims = {
  userId: string;
  tenantId: string;
  role: UserRole;
  expiresAt: Date;
  kind: 'access';
};

export type RefreshTokenClaims = {
  userId: string;
  expiresAt: Date;
  kind: 'refresh';
};

export type TokenPair = {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
};

export type AuthSession = TokenPair & {
  userId: string;
  tenantId: string;
  role: UserRole;
};

// Row shape returned by lookup_user.
export type StoredUser = {
  id: string;
  tenantId: string;
  email: string;
  role: UserRole;
  passwordHash: string;
};

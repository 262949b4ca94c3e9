/**
 * Claims carried by access tokens. `sub` is the owner key: `user:<id>` for
 * registered users, `guest:<uuid>` for guests.
 */
export interface JwtPayload {
  sub: string;
  uid: number | null;
  username: string;
  guest: boolean;
  iat?: number;
  exp?: number;
}

/** The principal attached to authenticated requests */
export interface AuthUser {
  ownerKey: string;
  userId: number | null;
  username: string;
  isGuest: boolean;
}

export const GUEST_USERNAME = 'Guest';

export function userOwnerKey(userId: number): string {
  return `user:${userId}`;
}

export function guestOwnerKey(guestId: string): string {
  return `guest:${guestId}`;
}

function hasFields<K extends string>(
  value: unknown,
  ...keys: K[]
): value is Record<K, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const record: object = value;
  return keys.every((key) => key in record);
}

export function isJwtPayload(value: unknown): value is JwtPayload {
  if (!hasFields(value, 'sub', 'uid', 'username', 'guest')) return false;
  const { sub, uid, username, guest } = value;
  return (
    typeof sub === 'string' &&
    (typeof uid === 'number' || uid === null) &&
    typeof username === 'string' &&
    typeof guest === 'boolean'
  );
}

export function isAuthUser(value: unknown): value is AuthUser {
  if (!hasFields(value, 'ownerKey', 'userId', 'username', 'isGuest')) {
    return false;
  }
  const { ownerKey, userId, username, isGuest } = value;
  return (
    typeof ownerKey === 'string' &&
    (typeof userId === 'number' || userId === null) &&
    typeof username === 'string' &&
    typeof isGuest === 'boolean'
  );
}

export function toAuthUser(payload: JwtPayload): AuthUser {
  return {
    ownerKey: payload.sub,
    userId: payload.guest ? null : payload.uid,
    username: payload.username,
    isGuest: payload.guest,
  };
}

/**
 * JWT payload structure
 */
export interface JwtPayload {
  sub: string; // User ID
  email?: string;
}

/**
 * User attached to the request after JWT validation
 */
export interface RequestUser {
  id: string;
  email: string | null;
}

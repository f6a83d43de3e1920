import { createHash, timingSafeEqual } from 'node:crypto'
import { AuthError, err, ok, type Result } from '@termbridge/shared'

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf-8').digest()
}

// Hashing first gives equal-length inputs, as timingSafeEqual requires.
export function credentialMatches(expected: string, provided: string): boolean {
  return timingSafeEqual(digest(expected), digest(provided))
}

/** No configured credential means every client is authenticated. */
export function checkAuthToken(
  credential: string | undefined,
  token: string | null,
): Result<void, AuthError> {
  if (credential === undefined) return ok(undefined)
  if (token === null) return err(new AuthError('No auth token provided'))
  if (!credentialMatches(credential, token)) return err(new AuthError('Invalid auth token'))
  return ok(undefined)
}

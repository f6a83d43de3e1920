import type { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify'
import fp from 'fastify-plugin'
import { AuthError } from '@termbridge/shared'
import { credentialMatches } from './credential.js'

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>
  }
}

export interface AuthPluginOptions {
  // Unset means HTTP routes are open.
  credential?: string | undefined
}

/** Accepts `Basic base64(credential)` or `Bearer credential`. */
export function presentedCredential(header: string | undefined): string | null {
  if (!header) return null
  const space = header.indexOf(' ')
  if (space < 0) return null
  const scheme = header.slice(0, space).toLowerCase()
  const value = header.slice(space + 1).trim()
  if (scheme === 'basic') return Buffer.from(value, 'base64').toString('utf-8')
  if (scheme === 'bearer') return value
  return null
}

const authPlugin: FastifyPluginAsync<AuthPluginOptions> = async (fastify, opts) => {
  const credential = opts.credential

  fastify.decorate('authenticate', async (request: FastifyRequest, reply: FastifyReply) => {
    if (credential === undefined) return undefined

    const presented = presentedCredential(request.headers.authorization)
    if (presented === null || !credentialMatches(credential, presented)) {
      const err = new AuthError(presented === null ? 'Credentials required' : 'Invalid credentials')
      return reply
        .code(401)
        .header('www-authenticate', 'Basic realm="termbridge"')
        .send({ error: { code: err.code, message: err.message } })
    }
    return undefined
  })
}

export default fp(authPlugin, { name: 'auth' })

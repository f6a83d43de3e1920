import { randomUUID } from 'node:crypto'

// Prefixed IDs for readability in logs
export function newSessionId(): string {
  return `sess_${randomUUID().replace(/-/g, '').slice(0, 16)}`
}

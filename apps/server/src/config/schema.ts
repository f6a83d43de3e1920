import { z } from 'zod'

export const PTY_BACKENDS = ['auto', 'pty', 'pipe'] as const
export type PtyBackend = (typeof PTY_BACKENDS)[number]

function defaultCommand(): string[] {
  return process.platform === 'win32' ? ['cmd.exe'] : ['bash']
}

export const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(7681),
  host: z.string().default('0.0.0.0'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // argv of the process spawned for every session
  command: z.array(z.string().min(1)).default([]).transform((argv) => (argv.length > 0 ? argv : defaultCommand())),
  cwd: z.string().optional(),

  // Shared secret the client must echo as AuthToken in its init frame.
  credential: z.string().min(1).optional(),
  // Without this, input and mouse frames are dropped.
  writable: z.boolean().default(false),
  checkOrigin: z.boolean().default(false),
  // 0 = unlimited
  maxClients: z.number().int().min(0).default(0),
  // Serve a single session, then shut down.
  once: z.boolean().default(false),

  // Accept mouse frames (tags 4 and 5).
  mouse: z.boolean().default(false),
  ptyBackend: z.enum(PTY_BACKENDS).default('auto'),
  maxPendingInputBytes: z.number().int().min(1).default(1024 * 1024),

  // Sent verbatim (as JSON) to every client on connect.
  preferences: z.record(z.unknown()).default({}),
})

export type ServerConfig = z.infer<typeof ServerConfigSchema>
export type ServerConfigInput = z.input<typeof ServerConfigSchema>

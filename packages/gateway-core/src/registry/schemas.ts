import { z } from 'zod'
import { ConfigurationError } from '../errors'
import type { CapabilityServer, InvalidTransport, ServerTransport } from '../types'

const headers = z.record(z.string()).optional()

export const serverTransportSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('stdio'),
    command: z.string().min(1),
    args: z.array(z.string()).optional(),
    env: z.record(z.string()).optional(),
  }),
  z.object({ type: z.literal('sse'), url: z.string().url(), headers }),
  z.object({ type: z.literal('streamable-http'), url: z.string().url(), headers }),
])

/** Validates a stored descriptor. A bad one is kept as `invalid` so only that server fails to connect. */
export function readServerTransport(raw: unknown): ServerTransport | InvalidTransport {
  const parsed = serverTransportSchema.safeParse(raw)
  if (parsed.success) return parsed.data
  const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'transport'}: ${i.message}`)
  return { type: 'invalid', error: issues.join('; ') }
}

export function requireTransport(server: Pick<CapabilityServer, 'id' | 'transport'>): ServerTransport {
  const { transport } = server
  if (transport.type === 'invalid') {
    throw new ConfigurationError(`Server ${server.id} has an invalid transport descriptor: ${transport.error}`)
  }
  return transport
}

export const promptArgumentSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  required: z.boolean().optional(),
})

export const promptArgumentsSchema = z.array(promptArgumentSchema)

const grantIds = z.array(z.string()).default([])

export const seedSchema = z.object({
  servers: z
    .array(
      z.object({
        id: z.string(),
        name: z.string(),
        description: z.string().nullable().default(null),
        transport: serverTransportSchema,
      }),
    )
    .default([]),
  tools: z
    .array(
      z.object({
        id: z.string(),
        serverId: z.string(),
        name: z.string(),
        description: z.string().nullable().default(null),
        inputSchema: z.record(z.unknown()).default({ type: 'object' }),
      }),
    )
    .default([]),
  resources: z
    .array(
      z.object({
        id: z.string(),
        serverId: z.string(),
        name: z.string(),
        uri: z.string(),
        description: z.string().nullable().default(null),
        mimeType: z.string().nullable().default(null),
      }),
    )
    .default([]),
  prompts: z
    .array(
      z.object({
        id: z.string(),
        serverId: z.string(),
        name: z.string(),
        description: z.string().nullable().default(null),
        arguments: promptArgumentsSchema.default([]),
      }),
    )
    .default([]),
  agents: z
    .array(
      z.object({
        id: z.string(),
        clientId: z.string(),
        /** Seeds carry the plaintext; only its hash is kept. */
        clientSecret: z.string().min(1),
        name: z.string(),
        description: z.string().nullable().default(null),
        toolIds: grantIds,
        resourceIds: grantIds,
        promptIds: grantIds,
      }),
    )
    .default([]),
})

export type RegistrySeed = z.infer<typeof seedSchema>
export type RegistrySeedInput = z.input<typeof seedSchema>

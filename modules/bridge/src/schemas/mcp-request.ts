import { z } from 'zod'
import { AUDIT_EVENT_TYPES } from '../audit/audit-log'

export const toolCallRequestSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
})

export const resourceReadRequestSchema = z.object({
  uri: z.string().min(1),
})

export const promptGetRequestSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.string()).default({}),
})

export const auditQuerySchema = z.object({
  correlation_id: z.string().optional(),
  event_type: z.enum(AUDIT_EVENT_TYPES).optional(),
  severity: z.enum(['debug', 'info', 'warning', 'error', 'critical']).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
})

export type ToolCallRequest = z.infer<typeof toolCallRequestSchema>
export type ResourceReadRequest = z.infer<typeof resourceReadRequestSchema>
export type PromptGetRequest = z.infer<typeof promptGetRequestSchema>
export type AuditQueryRequest = z.infer<typeof auditQuerySchema>

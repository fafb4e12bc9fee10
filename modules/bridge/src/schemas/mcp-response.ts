import type { Tool, Resource, Prompt } from '@modelcontextprotocol/sdk/types.js'
import type { VisibleTool, VisibleResource, VisiblePrompt } from '../router/capability-filter'

/** REST views of visible capabilities: the MCP descriptor plus where it comes from. */
export type ToolView = Tool & { capabilityId: string; serverId: string }
export type ResourceView = Resource & { capabilityId: string; serverId: string }
export type PromptView = Prompt & { capabilityId: string; serverId: string }

export function toToolView(t: VisibleTool): ToolView {
  return { ...t.descriptor, capabilityId: t.capabilityId, serverId: t.serverId }
}

export function toResourceView(r: VisibleResource): ResourceView {
  return { ...r.descriptor, capabilityId: r.capabilityId, serverId: r.serverId }
}

export function toPromptView(p: VisiblePrompt): PromptView {
  return { ...p.descriptor, capabilityId: p.capabilityId, serverId: p.serverId }
}

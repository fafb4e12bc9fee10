import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'

export const PREVIEW_LIMIT = 500

export function truncate(text: string, limit = PREVIEW_LIMIT): string {
  return text.length > limit ? text.slice(0, limit) : text
}

/** Audit preview of a tool result: the first content item only. */
export function previewToolResult(result: CallToolResult): Record<string, unknown> {
  const first = result.content[0]
  const base = { contentCount: result.content.length, isError: result.isError === true }
  if (!first) return { ...base, preview: null }

  const contentType: string = first.type
  switch (first.type) {
    case 'text':
      return { ...base, contentType: 'text', preview: truncate(first.text) }
    case 'image':
      return { ...base, contentType: 'image', preview: `[image ${first.mimeType}]` }
    case 'audio':
      return { ...base, contentType: 'audio', preview: `[audio ${first.mimeType}]` }
    case 'resource':
      return { ...base, contentType: 'resource', preview: first.resource.uri }
    default:
      return { ...base, contentType, preview: truncate(JSON.stringify(first)) }
  }
}

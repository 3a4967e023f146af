import type { z } from 'zod'

/**
 * Renders a zod issue path as an accessor expression, e.g. `[1].inputs[0].type`.
 */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  let out = ''
  for (const segment of path) {
    out += typeof segment === 'number' ? `[${segment}]` : `.${segment}`
  }
  return out.startsWith('.') ? out.slice(1) : out
}

/**
 * First issue of a failed parse, as `{ path, message }`.
 */
export function firstIssue(error: z.ZodError): { path: string; message: string } {
  const issue = error.issues[0]
  if (issue === undefined) return { path: '', message: error.message }
  return { path: formatIssuePath(issue.path), message: issue.message }
}

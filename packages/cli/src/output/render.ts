import type { ProbeResult } from '../commands/probe.js'

export interface RenderOptions {
  json: boolean
}

const OUTCOME_LABELS: Record<ProbeResult['outcome'], string> = {
  success: 'ok',
  'error-response': 'error response',
  timeout: 'timed out',
  failed: 'failed',
}

export function renderProbeResult(result: ProbeResult, options: RenderOptions): string {
  if (options.json) {
    return JSON.stringify(result, null, 2)
  }

  const rows: Array<[string, string]> = [
    ['address', `${result.network}://${result.address}`],
    ['transaction', result.transactionId],
    ['outcome', OUTCOME_LABELS[result.outcome]],
  ]
  if (result.messageType !== null) {
    rows.push(['type', result.messageType])
  }
  if (result.bodyLength !== null) {
    rows.push(['body', `${result.bodyLength} bytes`])
  }
  if (result.error !== null) {
    rows.push(['error', result.error])
  }
  rows.push(['elapsed', `${result.elapsedMs}ms`])

  const width = Math.max(...rows.map(([key]) => key.length))
  return rows.map(([key, value]) => `${key.padEnd(width)}  ${value}`).join('\n')
}

export function renderError(error: unknown, options: RenderOptions): string {
  const message = error instanceof Error ? error.message : String(error)
  if (options.json) {
    return JSON.stringify({ error: { message } }, null, 2)
  }
  return `Error: ${message}`
}

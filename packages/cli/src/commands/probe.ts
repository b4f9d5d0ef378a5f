import {
  StunMessageType,
  TransactionTimeoutError,
  TransactionId,
  createRootLogger,
  dial,
  formatMessageType,
  messageClassOf,
  type Logger,
  type StunClient,
  type StunClientOptions,
  type TransactionEvent,
} from '@stunwire/client'
import { z } from 'zod'

export type ProbeOutcome = 'success' | 'error-response' | 'timeout' | 'failed'

export interface ProbeResult {
  address: string
  network: string
  transactionId: string
  outcome: ProbeOutcome
  messageType: string | null
  bodyLength: number | null
  elapsedMs: number
  error: string | null
}

export interface ProbeCommandOptions {
  network?: string
  timeout?: string
  json?: boolean
  [key: string]: unknown
}

export interface ProbeDependencies {
  dial: (network: string, address: string, options: StunClientOptions) => Promise<StunClient>
  now: () => number
  logger: Logger
}

const TimeoutSchema = z.coerce.number().int().positive()

export function parseTimeout(raw: string | undefined): number {
  const parsed = TimeoutSchema.safeParse(raw ?? '3000')
  if (!parsed.success) {
    throw new Error(`Invalid --timeout value: ${String(raw)} (expected a positive integer in ms)`)
  }
  return parsed.data
}

function defaultDependencies(): ProbeDependencies {
  return {
    dial,
    now: Date.now,
    logger: createRootLogger({ level: 'warn', format: 'pretty' }),
  }
}

/**
 * Sends one Binding request and waits for whatever the transaction resolves to:
 * the server's answer, a timeout, or a client-side failure.
 */
export async function runProbe(
  address: string,
  options: { network: string; timeoutMs: number },
  deps: ProbeDependencies = defaultDependencies()
): Promise<ProbeResult> {
  const client = await deps.dial(options.network, address, { logger: deps.logger })
  const transactionId = TransactionId.random()
  const startedAt = deps.now()

  let event: TransactionEvent
  try {
    event = await new Promise<TransactionEvent>((resolve) => {
      client.start(
        {
          type: StunMessageType.BindingRequest,
          transactionId,
          payload: new Uint8Array(0),
        },
        resolve,
        { timeoutMs: options.timeoutMs }
      )
    })
  } finally {
    await client.close()
  }

  const base = {
    address,
    network: options.network,
    transactionId: transactionId.toHex(),
    elapsedMs: deps.now() - startedAt,
  }

  if (event.type === 'message') {
    const messageClass = messageClassOf(event.message.type)
    return {
      ...base,
      outcome: messageClass === 'success' ? 'success' : 'error-response',
      messageType: formatMessageType(event.message.type),
      bodyLength: event.message.payload.byteLength,
      error: null,
    }
  }

  return {
    ...base,
    outcome: event.error instanceof TransactionTimeoutError ? 'timeout' : 'failed',
    messageType: null,
    bodyLength: null,
    error: event.error.message,
  }
}

export async function runProbeCommand(
  address: string,
  options: ProbeCommandOptions
): Promise<ProbeResult> {
  return runProbe(address, {
    network: options.network ?? 'udp',
    timeoutMs: parseTimeout(options.timeout),
  })
}

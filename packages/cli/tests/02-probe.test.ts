import {
  HEADER_SIZE,
  StunClient,
  decodeHeader,
  encodeMessage,
  type StunConnection,
} from '@stunwire/client'
import { pino } from 'pino'
import { describe, expect, it, vi } from 'vitest'
import { parseTimeout, runProbe, type ProbeDependencies } from '../src/commands/probe.js'

const logger = pino({ level: 'silent' })

/** Connection that answers every request with the given message type, or stays silent. */
function respondingConnection(responseType: number | null): StunConnection {
  const dataHandlers = new Set<(chunk: Uint8Array) => void>()
  const closeHandlers = new Set<(error?: Error) => void>()
  return {
    framing: 'datagram',
    write: (data) => {
      if (responseType === null) return
      const header = decodeHeader(data.subarray(0, HEADER_SIZE))
      const response = encodeMessage({
        type: responseType,
        transactionId: header.transactionId,
        payload: new Uint8Array(8),
      })
      queueMicrotask(() => {
        for (const handler of dataHandlers) handler(response)
      })
    },
    close: () => {
      for (const handler of closeHandlers) handler()
      closeHandlers.clear()
    },
    onData: (handler) => {
      dataHandlers.add(handler)
      return () => dataHandlers.delete(handler)
    },
    onClose: (handler) => {
      closeHandlers.add(handler)
      return () => closeHandlers.delete(handler)
    },
  }
}

function deps(responseType: number | null, timeoutRate = 100) {
  const dial = vi.fn(
    async () => new StunClient(respondingConnection(responseType), { logger, timeoutRate })
  )
  let clock = 0
  const dependencies: ProbeDependencies = {
    dial,
    now: () => {
      clock += 5
      return clock
    },
    logger,
  }
  return { ...dependencies, dial }
}

describe('runProbe', () => {
  it('reports a binding success', async () => {
    const dependencies = deps(0x0101)
    const result = await runProbe('127.0.0.1:3478', { network: 'udp', timeoutMs: 1000 }, dependencies)

    expect(dependencies.dial).toHaveBeenCalledWith('udp', '127.0.0.1:3478', { logger })
    expect(result).toMatchObject({
      address: '127.0.0.1:3478',
      network: 'udp',
      outcome: 'success',
      messageType: '0x0101',
      bodyLength: 8,
      error: null,
    })
    expect(result.transactionId).toMatch(/^[0-9a-f]{24}$/)
  })

  it('reports error responses separately from successes', async () => {
    const result = await runProbe('127.0.0.1:3478', { network: 'tcp', timeoutMs: 1000 }, deps(0x0111))
    expect(result.outcome).toBe('error-response')
    expect(result.messageType).toBe('0x0111')
  })

  it('reports a timeout when the server never answers', async () => {
    const result = await runProbe('127.0.0.1:3478', { network: 'udp', timeoutMs: 1 }, deps(null, 5))
    expect(result.outcome).toBe('timeout')
    expect(result.messageType).toBeNull()
    expect(result.error).toBe(`Transaction ${result.transactionId} timed out`)
  })
})

describe('parseTimeout', () => {
  it('defaults to three seconds', () => {
    expect(parseTimeout(undefined)).toBe(3000)
  })

  it('rejects non-positive values', () => {
    expect(() => parseTimeout('0')).toThrow(
      'Invalid --timeout value: 0 (expected a positive integer in ms)'
    )
  })
})

import { describe, expect, it, vi } from 'vitest'
import { EventStreamTransport, WebSocketTransport } from '../src/transports'

function createMockSocket() {
  return { send: vi.fn(), close: vi.fn() }
}

function createMockResponse() {
  return { writeHead: vi.fn(), flushHeaders: vi.fn(), write: vi.fn(), end: vi.fn() }
}

const STREAM_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
}

describe('WebSocketTransport', () => {
  it('sends each batch as one frame', () => {
    const socket = createMockSocket()
    const transport = new WebSocketTransport(socket)

    transport.send('[]')
    transport.close()

    expect(transport.kind).toBe('websocket')
    expect(socket.send).toHaveBeenCalledWith('[]')
    expect(socket.close).toHaveBeenCalledTimes(1)
  })
})

describe('EventStreamTransport', () => {
  it('writes headers once and frames batches as events', () => {
    const res = createMockResponse()
    const transport = new EventStreamTransport(res)

    transport.open()
    transport.send('[1]')
    transport.send('[2]')

    expect(res.writeHead).toHaveBeenCalledTimes(1)
    expect(res.writeHead).toHaveBeenCalledWith(200, STREAM_HEADERS)
    expect(res.write.mock.calls).toEqual([['data: [1]\n\n'], ['data: [2]\n\n']])
  })

  it('flushes the headers on open, before any batch', () => {
    const res = createMockResponse()
    new EventStreamTransport(res).open()

    expect(res.writeHead).toHaveBeenCalledWith(200, STREAM_HEADERS)
    expect(res.flushHeaders).toHaveBeenCalledTimes(1)
    expect(res.writeHead.mock.invocationCallOrder[0]).toBeLessThan(res.flushHeaders.mock.invocationCallOrder[0])
    expect(res.write).not.toHaveBeenCalled()
  })

  it('opens the stream on first send', () => {
    const res = createMockResponse()
    new EventStreamTransport(res).send('[]')

    expect(res.writeHead).toHaveBeenCalledWith(200, STREAM_HEADERS)
    expect(res.write).toHaveBeenCalledWith('data: []\n\n')
  })

  it('ends the response once and ignores later batches', () => {
    const res = createMockResponse()
    const transport = new EventStreamTransport(res)
    transport.open()

    transport.close()
    transport.close()
    transport.send('[]')

    expect(res.end).toHaveBeenCalledTimes(1)
    expect(res.write).not.toHaveBeenCalled()
  })
})

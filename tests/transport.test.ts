import axios, { AxiosError, AxiosHeaders, CanceledError } from 'axios'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { AuthBlocked, ClientStopped, DecodeError, TimeoutError, TransportFailure } from '../src/errors.js'
import { HttpTransport } from '../src/transport.js'

vi.mock('../src/logger.js', () => ({
  default: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}))

const httpError = (status: number) => {
  const config = { headers: new AxiosHeaders(), method: 'post', url: '/api.cgi' }
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', config, undefined, {
    status,
    statusText: '',
    data: {},
    headers: {},
    config,
  })
}

describe('HttpTransport', () => {
  const post = vi.fn()

  const createTransport = (minRequestGapMs = 0) =>
    new HttpTransport({ host: '192.0.2.10', serialNumber: 'TEST-0001', timeoutMs: 2_000, minRequestGapMs })

  beforeEach(() => {
    post.mockReset()
    vi.spyOn(axios, 'create').mockReturnValue({ post } as unknown as ReturnType<typeof axios.create>)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should target the device address with the request timeout', () => {
    createTransport()
    expect(axios.create).toHaveBeenCalledWith({
      baseURL: 'http://192.0.2.10',
      headers: { 'Content-Type': 'application/json' },
      timeout: 2_000,
    })
  })

  it('should query and unpack the parameter list', async () => {
    post.mockResolvedValueOnce({ data: { sn: 'TEST-0001', par: [[2, 2, '1'], [5, 1, '24']] } })

    const raw = await createTransport().readParameters()

    expect(raw).toEqual({ '2': '1', '5': '24' })
    expect(post).toHaveBeenCalledWith('/api.cgi', { cmd: 1, sn: 'TEST-0001' }, { signal: expect.any(AbortSignal) })
  })

  it('should query the status block', async () => {
    post.mockResolvedValueOnce({ data: { 't.1': 368, 'f.0': 1 } })

    await expect(createTransport().readStatus()).resolves.toEqual({ 't.1': 368, 'f.0': 1 })
    expect(post).toHaveBeenCalledWith('/api.cgi', { cmd: 4, sn: 'TEST-0001' }, { signal: expect.any(AbortSignal) })
  })

  it('should send partial parameter writes', async () => {
    post.mockResolvedValueOnce({ data: { success: 'true' } })

    await createTransport().writeParameters([[5, 1, '22']])

    expect(post).toHaveBeenCalledWith(
      '/api.cgi',
      { sn: 'TEST-0001', par: [[5, 1, '22']] },
      { signal: expect.any(AbortSignal) },
    )
  })

  it('should fail a write the device rejects', async () => {
    post.mockResolvedValueOnce({ data: { success: 'false' } })
    await expect(createTransport().writeParameters([[5, 1, '22']])).rejects.toBeInstanceOf(TransportFailure)
  })

  it('should restart through the maintenance endpoint', async () => {
    post.mockResolvedValueOnce({ data: { success: 'true' } })
    await createTransport().restart()
    expect(post).toHaveBeenCalledWith('/test.cgi', { cmd: 'restart' }, { signal: expect.any(AbortSignal) })

    post.mockResolvedValueOnce({ data: {} })
    await expect(createTransport().restart()).rejects.toBeInstanceOf(TransportFailure)
  })

  describe('reply classification', () => {
    it('should treat a device timeout reply as a timeout', async () => {
      post.mockResolvedValueOnce({ data: { status: 'timeout' } })
      await expect(createTransport().readStatus()).rejects.toBeInstanceOf(TimeoutError)
    })

    it('should recognise a LAN block reply', async () => {
      post.mockResolvedValueOnce({ data: { status: 'error', message: 'LAN block is enabled' } })
      await expect(createTransport().readStatus()).rejects.toBeInstanceOf(AuthBlocked)
    })

    it('should reject replies that are not objects', async () => {
      post.mockResolvedValueOnce({ data: '<html>busy</html>' })
      await expect(createTransport().readStatus()).rejects.toBeInstanceOf(TransportFailure)
    })

    it('should reject a malformed parameter list', async () => {
      post.mockResolvedValueOnce({ data: { sn: 'TEST-0001' } })
      await expect(createTransport().readParameters()).rejects.toBeInstanceOf(DecodeError)
    })

    it('should map HTTP errors', async () => {
      post.mockRejectedValueOnce(httpError(403))
      await expect(createTransport().readStatus()).rejects.toBeInstanceOf(AuthBlocked)

      post.mockRejectedValueOnce(httpError(500))
      const failure = await createTransport()
        .readStatus()
        .catch((error: unknown) => error)
      expect(failure).toBeInstanceOf(TransportFailure)
      expect(failure instanceof TransportFailure && failure.message).toBe(
        'Request failed with status code 500 (500) [POST /api.cgi] - {}',
      )
    })

    it('should map request deadlines to timeouts', async () => {
      post.mockRejectedValueOnce(new AxiosError('timeout of 2000ms exceeded', 'ECONNABORTED'))
      await expect(createTransport().readStatus()).rejects.toBeInstanceOf(TimeoutError)
    })
  })

  it('should abort requests still in flight', async () => {
    post.mockImplementationOnce(
      (_url: string, _body: unknown, options: { signal: AbortSignal }) =>
        new Promise((_resolve, reject) => {
          options.signal.addEventListener('abort', () => reject(new CanceledError()))
        }),
    )
    const transport = createTransport()

    const pending = transport.readStatus()
    transport.abortAll()

    await expect(pending).rejects.toBeInstanceOf(ClientStopped)
  })

  it('should keep a gap between consecutive requests', async () => {
    const sentAt: number[] = []
    post.mockImplementation(async () => {
      sentAt.push(Date.now())
      return { data: {} }
    })
    const transport = createTransport(50)

    await transport.readStatus()
    await transport.readStatus()

    expect(sentAt).toHaveLength(2)
    expect((sentAt[1] ?? 0) - (sentAt[0] ?? 0)).toBeGreaterThanOrEqual(45)
  })
})

import { createHmac } from 'node:crypto'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createWebhookHandler } from '../handler'

describe('createWebhookHandler', () => {
  const webhookSecret = 'test-secret'
  const onEvent = vi.fn(async () => {})

  beforeEach(() => {
    vi.clearAllMocks()
  })

  function createSignature(body: string | Buffer, secret: string): string {
    return createHmac('sha256', secret).update(body).digest('hex')
  }

  function createRawRequest(body: Buffer, signature: string): Request {
    return new Request('http://localhost:3010/webhooks', {
      method: 'POST',
      headers: { authorization: `Bearer ${signature}` },
      body: new Uint8Array(body),
    })
  }

  function createRequest(
    bodyString: string,
    options: {
      secret?: string
      signature?: string
      header?: string
      bearer?: boolean
    } = {}
  ): Request {
    const signature =
      options.signature ??
      createSignature(bodyString, options.secret ?? webhookSecret)
    const headers = new Headers({ 'content-type': 'application/json' })

    if (signature) {
      headers.set(
        options.header ?? 'authorization',
        options.bearer === false ? signature : `Bearer ${signature}`
      )
    }

    return new Request('http://localhost:3010/webhooks', {
      method: 'POST',
      headers,
      body: bodyString,
    })
  }

  describe('signature verification', () => {
    it('accepts a valid signature and passes the event on', async () => {
      const handler = createWebhookHandler({ webhookSecret, onEvent })
      const body = JSON.stringify({ type: 'message.delivered', id: 'msg_1' })

      const response = await handler(createRequest(body))

      expect(response.status).toBe(200)
      expect(await response.json()).toEqual({ status: 'Received' })
      expect(onEvent).toHaveBeenCalledWith({
        type: 'message.delivered',
        id: 'msg_1',
      })
    })

    it('rejects a signature made with another secret', async () => {
      const handler = createWebhookHandler({ webhookSecret, onEvent })
      const body = JSON.stringify({ type: 'message.delivered' })

      const response = await handler(
        createRequest(body, { secret: 'wrong-secret' })
      )

      expect(response.status).toBe(403)
      expect(await response.json()).toEqual({ error: 'Invalid signature' })
      expect(onEvent).not.toHaveBeenCalled()
    })

    it('rejects a request without a signature', async () => {
      const handler = createWebhookHandler({ webhookSecret, onEvent })

      const response = await handler(createRequest('{}', { signature: '' }))

      expect(response.status).toBe(403)
      expect(onEvent).not.toHaveBeenCalled()
    })

    it('accepts a signature sent without the Bearer prefix', async () => {
      const handler = createWebhookHandler({ webhookSecret, onEvent })

      const response = await handler(createRequest('{}', { bearer: false }))

      expect(response.status).toBe(200)
    })

    it('reads the signature from a custom header', async () => {
      const handler = createWebhookHandler({
        webhookSecret,
        onEvent,
        signatureHeader: 'x-simplemsg-signature',
      })

      const response = await handler(
        createRequest('{"ok":true}', { header: 'x-simplemsg-signature' })
      )

      expect(response.status).toBe(200)
      expect(onEvent).toHaveBeenCalledWith({ ok: true })
    })
  })

  describe('body handling', () => {
    it('returns 400 for a signed body that is not JSON', async () => {
      const handler = createWebhookHandler({ webhookSecret, onEvent })

      const response = await handler(createRequest('not json'))

      expect(response.status).toBe(400)
      expect(await response.json()).toEqual({ error: 'Invalid JSON body' })
      expect(onEvent).not.toHaveBeenCalled()
    })

    it('verifies the raw bytes of a body with a UTF-8 BOM', async () => {
      const handler = createWebhookHandler({ webhookSecret, onEvent })
      const raw = Buffer.concat([
        Buffer.from([0xef, 0xbb, 0xbf]),
        Buffer.from('{"a":1}'),
      ])

      const response = await handler(
        createRawRequest(raw, createSignature(raw, webhookSecret))
      )

      expect(response.status).toBe(200)
      expect(onEvent).toHaveBeenCalledWith({ a: 1 })
    })

    it('rejects a signature computed over the BOM-stripped text', async () => {
      const handler = createWebhookHandler({ webhookSecret, onEvent })
      const raw = Buffer.concat([
        Buffer.from([0xef, 0xbb, 0xbf]),
        Buffer.from('{"a":1}'),
      ])

      const response = await handler(
        createRawRequest(raw, createSignature('{"a":1}', webhookSecret))
      )

      expect(response.status).toBe(403)
      expect(onEvent).not.toHaveBeenCalled()
    })

    it('verifies bodies holding invalid UTF-8 before decoding them', async () => {
      const handler = createWebhookHandler({ webhookSecret, onEvent })
      const raw = Buffer.concat([
        Buffer.from('{"a":"'),
        Buffer.from([0xff]),
        Buffer.from('"}'),
      ])

      const response = await handler(
        createRawRequest(raw, createSignature(raw, webhookSecret))
      )

      expect(response.status).toBe(200)
      expect(onEvent).toHaveBeenCalledWith({ a: '\uFFFD' })
    })

    it('returns 500 when onEvent throws', async () => {
      const handler = createWebhookHandler({
        webhookSecret,
        onEvent: async () => {
          throw new Error('queue down')
        },
      })

      const response = await handler(createRequest('{}'))

      expect(response.status).toBe(500)
      expect(await response.json()).toEqual({
        error: 'Internal error: queue down',
      })
    })

    it('responds with JSON content type', async () => {
      const handler = createWebhookHandler({ webhookSecret, onEvent })

      const response = await handler(createRequest('{}'))

      expect(response.headers.get('content-type')).toBe('application/json')
    })
  })
})

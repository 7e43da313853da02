import { computeWebhookSignature } from '@simplemsg/sdk/webhooks'
import { afterEach, describe, expect, it, vi } from 'vitest'
import type { CliConfig } from '../core/config-loader'
import { createContext } from '../core/context'
import { signPayload, verifyPayload } from './webhook'

const payload = '{"event":"message.received"}'
const secret = 'test-secret'

function setup(config: CliConfig = { webhookSecret: secret }) {
  const stdout = { write: vi.fn(), isTTY: false }
  const stderr = { write: vi.fn() }
  const ctx = createContext({ stdout, stderr, format: 'json', config })
  return { ctx, stdout, stderr }
}

describe('webhook commands', () => {
  afterEach(() => {
    process.exitCode = undefined
  })

  it('prints the signature for a payload', () => {
    const { ctx, stdout } = setup()

    signPayload(ctx, payload)

    const signature = computeWebhookSignature(payload, secret)
    expect(signature).toMatch(/^[0-9a-f]{64}$/)
    expect(stdout.write).toHaveBeenCalledWith(`{"signature":"${signature}"}\n`)
  })

  it('accepts a matching signature', () => {
    const { ctx, stdout, stderr } = setup()

    verifyPayload(ctx, payload, computeWebhookSignature(payload, secret))

    expect(stdout.write).toHaveBeenCalledWith('{"valid":true}\n')
    expect(stderr.write).not.toHaveBeenCalled()
    expect(process.exitCode).toBeUndefined()
  })

  it('rejects a signature made with another secret', () => {
    const { ctx, stdout, stderr } = setup()

    verifyPayload(ctx, payload, computeWebhookSignature(payload, 'other'))

    expect(stdout.write).toHaveBeenCalledWith('{"valid":false}\n')
    expect(stderr.write).toHaveBeenCalledWith(
      'ERROR: Signature does not match payload.\n'
    )
    expect(process.exitCode).toBe(1)
  })

  it('requires a secret', () => {
    const { ctx, stdout, stderr } = setup({})

    signPayload(ctx, payload)

    expect(stdout.write).not.toHaveBeenCalled()
    expect(stderr.write).toHaveBeenCalledWith(
      'ERROR: A webhook secret is required.\nSuggestion: Pass --secret or set SIMPLEMSG_WEBHOOK_SECRET.\n'
    )
    expect(process.exitCode).toBe(2)
  })

  it('signs and verifies with an empty secret', () => {
    const signature = computeWebhookSignature(payload, '')
    const signed = setup({ webhookSecret: '' })

    signPayload(signed.ctx, payload)
    expect(signed.stdout.write).toHaveBeenCalledWith(
      `{"signature":"${signature}"}\n`
    )

    const verified = setup({ webhookSecret: '' })
    verifyPayload(verified.ctx, payload, signature)
    expect(verified.stdout.write).toHaveBeenCalledWith('{"valid":true}\n')
    expect(process.exitCode).toBeUndefined()
  })
})

import { authorizeWithdraw } from '../../src/stages/withdraw'
import { OWNER_SCRIPT, SELLER_KEY, keyCredential, scriptCredential, txContext } from '../fixtures/listing'

describe('authorizeWithdraw', () => {
  const keyOwner = keyCredential(SELLER_KEY)
  const scriptOwner = scriptCredential(OWNER_SCRIPT)

  it('accepts a key owner that signed', () => {
    expect(authorizeWithdraw(keyOwner, txContext({ extraSignatories: [SELLER_KEY] }))).toEqual({ ok: true, value: 'signature' })
  })

  it('rejects a key owner that did not sign', () => {
    const r = authorizeWithdraw(keyOwner, txContext({ extraSignatories: [OWNER_SCRIPT] }))
    expect(r.ok).toBe(false)
    if (!r.ok) expect(r.reason.code).toBe('AUTH_SIGNATURE_MISSING')
  })

  it('accepts a script owner present in withdrawals, even for zero', () => {
    const r = authorizeWithdraw(scriptOwner, txContext({ withdrawals: [{ credential: scriptOwner, amount: 0n }] }))
    expect(r).toEqual({ ok: true, value: 'withdrawal' })
  })

  it('does not accept a script owner by signature', () => {
    const r = authorizeWithdraw(scriptOwner, txContext({ extraSignatories: [OWNER_SCRIPT] }))
    expect(r.ok).toBe(false)
    if (!r.ok) expect(r.reason.code).toBe('AUTH_WITHDRAWAL_MISSING')
  })

  it('does not confuse a key withdrawal with the script owner', () => {
    const r = authorizeWithdraw(scriptOwner, txContext({ withdrawals: [{ credential: keyCredential(OWNER_SCRIPT), amount: 5n }] }))
    expect(r.ok).toBe(false)
  })
})

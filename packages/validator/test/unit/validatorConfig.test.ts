import { loadValidatorConfig } from '../../src/validatorConfig'
import { ReasonedRejection } from '@listing-escrow/reasons'

describe('loadValidatorConfig', () => {
  let warn: jest.SpyInstance
  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined)
  })
  afterEach(() => warn.mockRestore())

  const auth1 = 'C1'.repeat(28)
  const auth2 = 'c2'.repeat(28)
  const fee = 'f1'.repeat(28)

  it('parses authorizers and the fee address', () => {
    const cfg = loadValidatorConfig({
      AUTHORIZER_KEY_HASHES: ` ${auth1}, ${auth2} ,`,
      FEE_PAYMENT_CREDENTIAL: `script:${fee}`,
      FEE_STAKE_CREDENTIAL: `key:${auth2}`,
    })
    expect(cfg.authorizers).toEqual(['c1'.repeat(28), auth2])
    expect(cfg.feeAddress).toEqual({
      paymentCredential: { type: 'Script', hash: fee },
      stakeCredential: { type: 'VerificationKey', hash: auth2 },
    })
    expect(Object.isFrozen(cfg)).toBe(true)
  })

  it('treats an empty stake credential as none', () => {
    const cfg = loadValidatorConfig({ AUTHORIZER_KEY_HASHES: '', FEE_PAYMENT_CREDENTIAL: `key:${fee}`, FEE_STAKE_CREDENTIAL: '' })
    expect(cfg.authorizers).toEqual([])
    expect(cfg.feeAddress.stakeCredential).toBeNull()
  })

  it('throws a CONFIG_INVALID rejection for a malformed fee credential', () => {
    let caught: unknown
    try {
      loadValidatorConfig({ AUTHORIZER_KEY_HASHES: '', FEE_PAYMENT_CREDENTIAL: 'addr_test1xyz', FEE_STAKE_CREDENTIAL: '' })
    } catch (e) {
      caught = e
    }
    expect(caught).toBeInstanceOf(ReasonedRejection)
    if (caught instanceof ReasonedRejection) {
      expect(caught.reason.code).toBe('CONFIG_INVALID')
      expect(caught.reason.context?.field).toBe('FEE_PAYMENT_CREDENTIAL')
    }
  })

  it('rejects a short authorizer hash', () => {
    expect(() =>
      loadValidatorConfig({ AUTHORIZER_KEY_HASHES: 'abcd', FEE_PAYMENT_CREDENTIAL: `key:${fee}`, FEE_STAKE_CREDENTIAL: '' })
    ).toThrow(ReasonedRejection)
  })
})

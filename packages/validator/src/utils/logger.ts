import pino from 'pino'

type VerdictPayload = {
  listing?: string
  action: string
  accepted: boolean
  reason_code?: string
  discounted?: boolean
  fee?: string
  duration_ms?: number
  ts?: string
}

// create default logger; tests can replace via setLogger
let logger: pino.BaseLogger = pino({ level: process.env.LOG_LEVEL || 'info' })

export function setLogger(l: pino.BaseLogger) {
  logger = l
}

export function getLogger(): pino.BaseLogger {
  return logger
}

export function logVerdict(payload: VerdictPayload): void {
  const ts = payload.ts ?? new Date().toISOString()
  const base = {
    event: 'listing.verdict',
    listing: payload.listing,
    action: payload.action,
    accepted: payload.accepted,
    reason_code: payload.reason_code,
    discounted: payload.discounted,
    fee: payload.fee,
    duration_ms: payload.duration_ms,
    ts
  }

  if (!payload.accepted) logger.warn(base)
  else logger.info(base)
}

export function logDecodeFailure(error: string, listing?: string): void {
  logger.warn({ event: 'listing.decode_failed', listing, error })
}

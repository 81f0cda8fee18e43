export { ReasonedRejection } from './errors'
export { reason, type ReasonOverrides } from './factory'
export { REASONS, getReason } from './registry'

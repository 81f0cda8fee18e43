import { Registry, Counter, Histogram } from 'prom-client'

let registry: Registry
let verdictCounter: Counter<string>
let rejectionCounter: Counter<string>
let evaluationHistogram: Histogram<string>

function initMetrics(reg?: Registry) {
  registry = reg ?? new Registry()

  verdictCounter = new Counter({
    name: 'verdict_counter',
    help: 'Counts validator verdicts by action and outcome',
    labelNames: ['action', 'outcome'],
    registers: [registry]
  })

  rejectionCounter = new Counter({
    name: 'rejection_counter',
    help: 'Counts rejections by category and reason',
    labelNames: ['category', 'reason'],
    registers: [registry]
  })

  evaluationHistogram = new Histogram({
    name: 'evaluation_histogram',
    help: 'Validator evaluation duration by action (ms)',
    labelNames: ['action'],
    buckets: [0.05, 0.1, 0.5, 1, 5, 10, 50],
    registers: [registry]
  })
}

// initialize default metrics on module load
initMetrics()

export function setRegistry(reg: Registry) {
  initMetrics(reg)
}

export function countVerdict(action: string, accepted: boolean) {
  verdictCounter.labels({ action, outcome: accepted ? 'accepted' : 'rejected' }).inc()
}

export function countRejection(category: string, reason: string) {
  rejectionCounter.labels({ category, reason }).inc()
}

export function observeEvaluation(action: string, ms: number) {
  evaluationHistogram.labels({ action }).observe(ms)
}

export { registry }

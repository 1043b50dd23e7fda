// Runtime metrics context for dynamic counters and gauges
type Ctx = { [k: string]: number };
let ctx: Ctx = Object.create(null);

export function inc(key: string, by = 1) {
  ctx[key] = (ctx[key] ?? 0) + by;
}

export function setGauge(key: string, v: number) {
  ctx[key] = v;
}

export function getAll(): Record<string, number> {
  return { ...ctx };
}

export function resetMetrics() {
  ctx = Object.create(null);
}

// Helpers for project file outcomes
export function incFileOp(op: 'save' | 'load', outcome: 'ok' | string) {
  inc(`project_file_total{op=${op},outcome=${outcome}}`);
}

export function setComponentCount(n: number) {
  setGauge('project_components', n);
}

export function createRunId(now = new Date(), prefix = "batch"): string {
  const suffix = Math.random().toString(36).slice(2, 8);
  return `${prefix}_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}

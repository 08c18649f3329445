export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = (ms: number): Promise<void> => new Promise((resolve) => { setTimeout(resolve, ms) })

function pad(n: number): string {
  return String(n).padStart(2, '0')
}

/** Local time as YYYYMMDD_HHMMSS, for per-run file names. */
export function runStamp(d: Date): string {
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`
}

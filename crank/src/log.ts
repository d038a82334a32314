export type LogFn = (msg: string) => void;

export function log(msg: string): void {
  const ts = new Date().toISOString().slice(11, 23);
  console.log(`[${ts}] ${msg}`);
}

export function scopedLog(scope: string): LogFn {
  return (msg) => log(`[${scope}] ${msg}`);
}

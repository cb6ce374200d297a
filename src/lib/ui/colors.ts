import type { ResultRecord } from '../types';

export type Colorize = (s: string) => string;

let enabled = !!process.stdout?.isTTY;

export function setColorEnabled(v: boolean) {
  enabled = v;
}

function ansi(code: number): Colorize {
  return (s: string) => (enabled ? `\x1b[${code}m${s}\x1b[0m` : s);
}

export const green = ansi(32);
export const yellow = ansi(33);
export const red = ansi(31);
export const cyan = ansi(36);
export const dim = ansi(2);
export const bold = ansi(1);

export type LookupStatus = 'success' | 'failed';

export function statusOf(r: ResultRecord): LookupStatus {
  return r.errorReason === null ? 'success' : 'failed';
}

/** `✓` in green for a match, `✗` in red for a failure. */
export function statusMark(status: LookupStatus | ResultRecord): string {
  const s = typeof status === 'string' ? status : statusOf(status);
  return s === 'success' ? green('✓') : red('✗');
}

/** Failure reasons in red, track descriptions as they are. */
export function colorForStatus(status: LookupStatus): Colorize {
  return status === 'failed' ? red : (s) => s;
}

export function isTTY() {
  return !!process.stdout?.isTTY;
}

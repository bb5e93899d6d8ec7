// Raw ANSI codes

const useColor = !process.env.NO_COLOR;

function wrap(code: string): (s: string) => string {
  return (s: string) => (useColor ? `${code}${s}\x1b[0m` : s);
}

export const bold = wrap('\x1b[1m');
export const dim = wrap('\x1b[2m');
export const red = wrap('\x1b[31m');
export const green = wrap('\x1b[32m');
export const yellow = wrap('\x1b[33m');
export const blue = wrap('\x1b[34m');
export const cyan = wrap('\x1b[36m');

export function statusColor(status: string): string {
  switch (status) {
    case 'CONFIRMED': return green(status);
    case 'FALSIFIED': return red(status);
    case 'PARTIAL': return yellow(status);
    case 'SUPERSEDED': return dim(status);
    case 'PROPOSED': return cyan(status);
    default: return status;
  }
}

export function verdictColor(verdict: string): string {
  switch (verdict) {
    case 'PASS': return green(verdict);
    case 'FAIL': return red(verdict);
    case 'INCONCLUSIVE': return yellow(verdict);
    default: return verdict;
  }
}

export function tierColor(tier: number): string {
  const label = `T${tier}`;
  if (tier === 0) return bold(green(label));
  if (tier <= 2) return cyan(label);
  if (tier === 3) return yellow(label);
  return red(label);
}

export function confidenceColor(confidence: string): string {
  switch (confidence) {
    case 'VALIDATED': return green(confidence);
    case 'RULE_ASSIGNED':
    case 'CLUSTER_ASSIGNED':
      return cyan(confidence);
    case 'AMBIGUOUS': return yellow(confidence);
    default: return dim(confidence);
  }
}

/** Fixed-precision number for tables; null renders as an em dash. */
export function num(value: number | null | undefined, digits = 4): string {
  if (value === null || value === undefined || Number.isNaN(value)) return '—';
  if (value !== 0 && Math.abs(value) < 10 ** -digits) return value.toExponential(2);
  return value.toFixed(digits);
}

/**
 * Format data as a simple table with column headers.
 */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map(r => stripAnsi(r[i] ?? '').length))
  );

  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ');
  const separator = widths.map(w => '─'.repeat(w)).join('──');
  const bodyLines = rows.map(row =>
    row.map((cell, i) => {
      const stripped = stripAnsi(cell);
      const padding = widths[i] - stripped.length;
      return cell + ' '.repeat(Math.max(0, padding));
    }).join('  ')
  );

  return [bold(headerLine), separator, ...bodyLines].join('\n');
}

export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Print header banner for a command.
 */
export function header(title: string): void {
  console.log(`\n${bold(`[tessera] ${title}`)}\n`);
}

export function warn(msg: string): void {
  console.log(`${yellow('[tessera]')} ${msg}`);
}

export function info(msg: string): void {
  console.log(`${cyan('[tessera]')} ${msg}`);
}

export function success(msg: string): void {
  console.log(`${green('[tessera]')} ${msg}`);
}

export function error(msg: string): void {
  console.error(`${red('[tessera]')} ${msg}`);
}

/** Print a value as the single JSON document of a `--json` run. */
export function json(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

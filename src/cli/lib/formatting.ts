export const color = {
  blue: (s: string) => `\x1b[34m${s}\x1b[0m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[0m`,
  green: (s: string) => `\x1b[32m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  dim: (s: string) => `\x1b[2m${s}\x1b[0m`,
};

const RULE = '='.repeat(65);

/** Blank line, ruled title, blank line. */
export function formatHeader(title: string): string[] {
  return ['', color.blue(RULE), color.blue(`  ${title}`), color.blue(RULE), ''];
}

export function formatSuccess(message: string): string {
  return color.green(`✓ ${message}`);
}

export function formatWarning(message: string): string {
  return color.yellow(`⚠ ${message}`);
}

export function formatFailure(message: string): string {
  return color.red(`✗ ${message}`);
}

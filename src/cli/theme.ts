import chalk from 'chalk';

export type Palette = {
  success: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
  bold: (s: string) => string;
};

// chalk.level is already 0 when stdout is not a colour terminal
const base = (noColor: boolean) => new chalk.Instance({ level: noColor ? 0 : chalk.level });

export function getPalette(opts: { noColor?: boolean } = {}): Palette {
  const noColor = !!opts.noColor || !!process.env.NO_COLOR || process.argv.includes('--no-color');
  const c = base(noColor);
  return {
    success: c.green,
    error: c.red,
    dim: c.gray,
    bold: c.bold,
  };
}

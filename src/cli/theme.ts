import chalk from 'chalk';

export type Palette = {
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
};

export function colorLevel(): chalk.Level {
  const noColor = !!process.env.NO_COLOR || process.argv.includes('--no-color');
  return noColor ? 0 : 3;
}

export function getPalette(level: chalk.Level = colorLevel()): Palette {
  const c = new chalk.Instance({ level });
  const theme = (process.env.CLI_THEME || 'felt').toLowerCase();
  if (theme === 'mono') {
    return {
      info: c.white,
      success: c.white,
      warn: c.white,
      error: c.white,
      dim: c.gray,
    };
  }
  // felt (default)
  return {
    info: c.cyan,
    success: c.green,
    warn: c.yellow,
    error: c.red,
    dim: c.gray,
  };
}

/** Jest sets JEST_WORKER_ID; NODE_ENV=test counts too. */
export function isTestEnv(): boolean {
  return !!(process.env.JEST_WORKER_ID || process.env.NODE_ENV === 'test');
}

export function isCi(): boolean {
  return !!process.env.CI;
}

export function isQuiet(): boolean {
  return process.env.QUIET === '1' || process.argv.includes('--quiet');
}

/** Progress bars and colour only when a person is watching. */
export function isInteractive(): boolean {
  return !!process.stdout.isTTY && !isCi() && !isQuiet();
}

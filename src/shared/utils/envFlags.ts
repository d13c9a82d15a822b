// Shared helpers for reading environment flags. Keeping this logic
// centralised means engine diagnostics behave the same in the CLI, in
// embedding hosts and under Jest.

type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * says otherwise.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string): boolean {
  const raw = readEnv(name);
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

/**
 * Per-root-move score tracing for the minimax search. Verbose: every root
 * candidate is logged at debug level with its score.
 */
export function isSearchTraceEnabled(): boolean {
  return flagEnabled('ATAXX_SEARCH_TRACE');
}

/* ------------------------------------------------------------------
   Tiny, dependency-free logger with five verbosity levels
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = errors only … 4 = trace

export interface Logger {
  level : Verbosity;
  log(lvl: Verbosity, msg: string): void;
}

export function createLogger(
  level: Verbosity = 0,
  sink : (msg: string) => void = console.info,
): Logger {
  return {
    level,
    log(lvl, msg) {
      if (lvl <= this.level) sink(`${lvl}| ${msg}`);
    },
  };
}

const LEVELS: readonly Verbosity[] = [0, 1, 2, 3, 4];

/** Clamp an arbitrary count (e.g. repeated `-v` flags) into a level. */
export function toVerbosity(n: number): Verbosity {
  if (!Number.isFinite(n)) return 0;
  return LEVELS[Math.min(4, Math.max(0, Math.floor(n)))];
}

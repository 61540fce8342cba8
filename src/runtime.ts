/**
 * Process-facing side effects behind one seam, so commands can run against a
 * recording runtime in tests.
 */
export type RuntimeEnv = {
  /** One line to stdout. */
  log: (...args: unknown[]) => void;
  /** One line to stderr. */
  error: (...args: unknown[]) => void;
  /** Clear the terminal (watch mode). */
  clear: () => void;
  exit: (code: number) => void;
};

export const defaultRuntime: RuntimeEnv = {
  log: (...args) => console.log(...args),
  error: (...args) => console.error(...args),
  clear: () => console.clear(),
  exit: (code) => {
    process.exit(code);
  },
};

/* eslint-disable no-console */
/**
 * Console logger with colours and an optional scope prefix.
 */

// ANSI color support - respects NO_COLOR env var and non-TTY
const USE_COLOR = !process.env.NO_COLOR && process.stdout.isTTY !== false;

const RESET = USE_COLOR ? '\x1b[0m' : '';
const GREEN = USE_COLOR ? '\x1b[32m' : '';
const RED = USE_COLOR ? '\x1b[31m' : '';
const YELLOW = USE_COLOR ? '\x1b[33m' : '';
const BLUE = USE_COLOR ? '\x1b[34m' : '';
const DIM = USE_COLOR ? '\x1b[2m' : '';
const BOLD = USE_COLOR ? '\x1b[1m' : '';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Only printed when the DEBUG environment variable is set */
  debug(message: string): void;
  /** Unformatted line on stdout */
  log(message: string): void;
  newline(): void;
  section(title: string): void;
}

export function createLogger(scope?: string): Logger {
  const tag = scope ? `[${scope}] ` : '';
  return {
    info(message) {
      console.log(`${BLUE}ℹ ${tag}${message}${RESET}`);
    },
    success(message) {
      console.log(`${GREEN}✓ ${tag}${message}${RESET}`);
    },
    warn(message) {
      console.warn(`${YELLOW}⚠ ${tag}${message}${RESET}`);
    },
    error(message) {
      console.error(`${RED}✗ ${tag}${message}${RESET}`);
    },
    debug(message) {
      if (process.env.DEBUG) {
        console.log(`${DIM}🔍 ${tag}${message}${RESET}`);
      }
    },
    log(message) {
      console.log(message);
    },
    newline() {
      console.log();
    },
    section(title) {
      console.log();
      console.log(`${BOLD}━━━ ${tag}${title} ━━━${RESET}`);
    },
  };
}

export const logger = createLogger();

/**
 * Logger utility with verbose mode support
 * - info(): always prints (page progress, saved files)
 * - debug(): only prints with --verbose
 * - stop(): pagination stop reasons
 * - summary(): final per-user counts
 */

export interface LoggerConfig {
  verbose?: boolean;
}

export interface UserSummary {
  username: string;
  count: number;
  skipped?: boolean;
}

const PREFIX = '[x-month-export]';

class Logger {
  private verbose: boolean = false;

  constructor(config?: LoggerConfig) {
    this.verbose = config?.verbose ?? false;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  /**
   * Always prints
   */
  info(message: string): void {
    console.log(`${PREFIX} ${message}`);
  }

  /**
   * Only prints in verbose mode - request parameters, retry notes
   */
  debug(message: string): void {
    if (this.verbose) {
      console.log(`${PREFIX} DEBUG: ${message}`);
    }
  }

  /**
   * Reason a timeline walk ended
   */
  stop(message: string): void {
    console.log(`${PREFIX} [STOP] ${message}`);
  }

  summary(users: UserSummary[]): void {
    if (users.length === 0) {
      return;
    }

    const exported = users.filter((u) => !u.skipped);
    const skipped = users.filter((u) => u.skipped);
    const total = exported.reduce((sum, u) => sum + u.count, 0);

    this.info(
      `Summary: ${exported.length} account(s) exported, ${skipped.length} skipped, ${total} posts total`
    );
    for (const user of users) {
      this.info(user.skipped ? `  @${user.username}: skipped` : `  @${user.username}: ${user.count} posts`);
    }
  }

  warn(message: string): void {
    console.warn(`${PREFIX} WARNING: ${message}`);
  }

  error(message: string): void {
    console.error(`${PREFIX} ERROR: ${message}`);
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get or create the logger singleton
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(config);
  } else if (config?.verbose !== undefined) {
    loggerInstance.setVerbose(config.verbose);
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

export { Logger };

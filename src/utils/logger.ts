import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
  const configured = process.env.ENGINE_CACHE_LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return process.env.DEBUG ? 'debug' : 'info';
}

export class Logger {
  private static level: LogLevel = levelFromEnv();

  static setLevel(level: LogLevel): void {
    this.level = level;
  }

  static parseLevel(value: string): LogLevel | undefined {
    const normalized = value.toLowerCase();
    return isLogLevel(normalized) ? normalized : undefined;
  }

  private static enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  static info(message: string): void {
    if (this.enabled('info')) {
      console.log(chalk.blue('ℹ'), message);
    }
  }

  static success(message: string): void {
    if (this.enabled('info')) {
      console.log(chalk.green('✓'), message);
    }
  }

  static warning(message: string): void {
    if (this.enabled('warn')) {
      console.log(chalk.yellow('⚠'), message);
    }
  }

  static error(message: string): void {
    if (this.enabled('error')) {
      console.error(chalk.red('✗'), message);
    }
  }

  static debug(message: string): void {
    if (this.enabled('debug')) {
      console.log(chalk.gray('🔍'), message);
    }
  }

  /**
   * Rewrites the current terminal line; only used for interactive transfers
   */
  static progress(message: string): void {
    if (this.enabled('info') && process.stdout.isTTY) {
      process.stdout.write(chalk.cyan('»') + ' ' + message + '\r');
    }
  }

  static clearProgress(): void {
    if (this.enabled('info') && process.stdout.isTTY) {
      process.stdout.write(' '.repeat(process.stdout.columns || 80) + '\r');
    }
  }

  static title(title: string): void {
    if (this.enabled('info')) {
      console.log('\n' + chalk.bold.cyan(title));
      console.log(chalk.cyan('═'.repeat(title.length)));
    }
  }

  static subTitle(subTitle: string): void {
    if (this.enabled('info')) {
      console.log('\n' + chalk.bold(subTitle));
      console.log(chalk.gray('─'.repeat(subTitle.length)));
    }
  }

  static json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }
}

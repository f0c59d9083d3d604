const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000
};

export class Validator {
  /**
   * Engine versions double as directory names, so only a conservative character set is accepted
   */
  static isValidEngineVersion(version: string): boolean {
    return (
      version.length > 0 &&
      version.length <= 128 &&
      version !== '.' &&
      version !== '..' &&
      /^[A-Za-z0-9][A-Za-z0-9._+-]*$/.test(version)
    );
  }

  static isValidUrl(value: string): boolean {
    try {
      const url = new URL(value);
      return url.protocol === 'https:' || url.protocol === 'http:';
    } catch {
      return false;
    }
  }

  /**
   * Validate a non-negative integer such as a retention count
   */
  static isValidCount(value: number): boolean {
    return Number.isInteger(value) && value >= 0;
  }

  /**
   * Parse a duration like "500ms", "30s", "15m", "12h" or "30d" into milliseconds.
   * A bare number is taken as milliseconds.
   */
  static parseDuration(value: string): number | undefined {
    const match = value.trim().match(/^(\d+(?:\.\d+)?)(ms|s|m|h|d)?$/);
    if (!match) {
      return undefined;
    }
    const amount = Number.parseFloat(match[1]);
    const unit = match[2] ?? 'ms';
    return Math.round(amount * DURATION_UNITS[unit]);
  }

  static formatDuration(ms: number): string {
    if (ms % DURATION_UNITS.d === 0 && ms > 0) return `${ms / DURATION_UNITS.d}d`;
    if (ms % DURATION_UNITS.h === 0 && ms > 0) return `${ms / DURATION_UNITS.h}h`;
    if (ms % DURATION_UNITS.m === 0 && ms > 0) return `${ms / DURATION_UNITS.m}m`;
    if (ms % DURATION_UNITS.s === 0 && ms > 0) return `${ms / DURATION_UNITS.s}s`;
    return `${ms}ms`;
  }

  static formatBytes(bytes: number): string {
    const units = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];
    let value = bytes;
    let unit = 0;
    while (value >= 1024 && unit < units.length - 1) {
      value /= 1024;
      unit++;
    }
    return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
  }
}

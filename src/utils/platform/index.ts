export class Platform {
  /**
   * Build platform identifier used to pick per-platform downloads from a manifest,
   * e.g. "win-x64", "linux-arm64" or "osx-arm64"
   */
  static runtimeId(platform: NodeJS.Platform = process.platform, arch: string = process.arch): string {
    const os = platform === 'win32' ? 'win' : platform === 'darwin' ? 'osx' : platform;
    const cpu = arch === 'ia32' ? 'x86' : arch;
    return `${os}-${cpu}`;
  }
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function envBool(val?: string): boolean {
  if (!val) return false;
  const v = val.toLowerCase();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

// Tagged console logger; debug lines only when EPG_DEBUG is set.
export function createLogger(tag: string, debugEnabled = envBool(process.env.EPG_DEBUG)): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => { if (debugEnabled) console.log(prefix, ...args); },
    info: (...args) => console.log(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

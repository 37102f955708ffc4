const DEBUG_FLAG = '__BUDDY_DEBUG__';

const isDebugEnabled = () => {
  const globalDebug = Reflect.get(globalThis, DEBUG_FLAG) === true;
  const envDebug = typeof process !== 'undefined' && process.env?.BUDDY_DEBUG === '1';
  return globalDebug || envDebug;
};

export const enableDebugLogging = (enabled: boolean) => {
  Reflect.set(globalThis, DEBUG_FLAG, enabled);
};

export function debug(...args: unknown[]) {
  if (isDebugEnabled()) console.log('[buddy]', ...args);
}

export function info(...args: unknown[]) {
  console.info('[buddy]', ...args);
}

export function warn(...args: unknown[]) {
  console.warn('[buddy]', ...args);
}

export function error(...args: unknown[]) {
  console.error('[buddy]', ...args);
}

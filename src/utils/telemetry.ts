const truthyValues = new Set(['1', 'true', 'yes', 'on']);

const isTruthy = (value: unknown): boolean => {
  if (typeof value !== 'string') {
    return false;
  }
  return truthyValues.has(value.toLowerCase());
};

const enabled = Boolean(import.meta.env.DEV) || isTruthy(import.meta.env.VITE_ENABLE_DEBUG_LOGS);

type Level = 'debug' | 'info' | 'warn' | 'error';

const pickLogger = (level: Level) => {
  if (level === 'error') return console.error;
  if (level === 'warn') return console.warn;
  if (level === 'info') return console.info;
  return console.debug;
};

const write = (level: Level, event: string, payload: Record<string, unknown>): void => {
  if (!enabled) {
    return;
  }
  pickLogger(level)(`[telemetry] ${event}`, payload);
};

export const telemetry = {
  enabled,
  historyLoad(payload: Record<string, unknown>): void {
    write('debug', 'history.load', payload);
  },
  historyCommit(payload: Record<string, unknown>): void {
    write('info', 'history.commit', payload);
  },
  historyClear(payload: Record<string, unknown>): void {
    write('info', 'history.clear', payload);
  },
  storeError(payload: Record<string, unknown>): void {
    write('error', 'store.error', payload);
  },
  storeSync(payload: Record<string, unknown>): void {
    write('debug', 'store.sync', payload);
  },
  popupShow(payload: Record<string, unknown>): void {
    write('debug', 'popup.show', payload);
  },
};

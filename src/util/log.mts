export const logLevels = ['none', 'warn', 'progress'] as const;
export type LogLevel = (typeof logLevels)[number];
export type Logger = (level: number, message: string) => void;

export const NO_LOG: Logger = () => {};

export function makeLogger(level: LogLevel, write: (message: string) => void): Logger {
  const maxLevel = logLevels.indexOf(level);
  return (messageLevel, message) => {
    if (messageLevel <= maxLevel) {
      write(message);
    }
  };
}

import { pino, type DestinationStream, type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export interface CreateLoggerOptions {
  readonly name?: string;
  readonly level?: LevelWithSilent;
  readonly destination?: DestinationStream;
}

export const createLogger = (options: CreateLoggerOptions = {}): Logger => {
  const settings = {
    name: options.name ?? 'StrataPipeline',
    level: options.level ?? 'info'
  };
  return options.destination ? pino(settings, options.destination) : pino(settings);
};

export const createSilentLogger = (): Logger => pino({ level: 'silent' });

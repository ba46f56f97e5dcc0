import pino, { type DestinationStream, type Logger } from 'pino';
import { createStream } from 'rotating-file-stream';

export type { Logger };

export type LogOptions = {
  debug: boolean;
  dir: string | null; // null disables the log file
  file: string;
  maxSizeMb: number;
  backupCount: number;
};

const base = { service: 'airwaves' };

// Used until the configuration is loaded, and for configuration errors.
export function createBootstrapLogger(): Logger {
  return pino({ base, timestamp: pino.stdTimeFunctions.isoTime });
}

export function createLogger(options: LogOptions, stdout: DestinationStream = pino.destination(1)): Logger {
  const level = options.debug ? 'debug' : 'info';
  const streams: pino.StreamEntry[] = [{ level, stream: stdout }];

  if (options.dir) {
    const file = createStream(options.file, {
      path: options.dir,
      size: `${Math.max(1, Math.round(options.maxSizeMb * 1024))}K`,
      maxFiles: options.backupCount,
    });
    streams.push({ level, stream: file });
  }

  return pino({ level, base, timestamp: pino.stdTimeFunctions.isoTime }, pino.multistream(streams));
}

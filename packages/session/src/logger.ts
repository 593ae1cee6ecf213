import { Layer, Logger, LogLevel } from "effect";

/**
 * Receives every formatted log line
 */
export type LogSink = (line: string, level: LogLevel.LogLevel) => void;

/**
 * Create a logger layer that formats `[replkit:<LEVEL>] message` lines
 * @param sink - Where formatted lines go
 * @param verbose - Whether to enable debug logging
 * @returns Layer with custom logger configured
 */
export const createLoggerLayer = (sink: LogSink, verbose: boolean): Layer.Layer<never> => {
  const replkitLogger = Logger.make(({ logLevel, message }) => {
    const text = Array.isArray(message) ? message.map(String).join(" ") : String(message);
    sink(`[replkit:${logLevel.label}] ${text}`, logLevel);
  });

  return Layer.merge(
    Logger.replace(Logger.defaultLogger, replkitLogger),
    Logger.minimumLogLevel(verbose ? LogLevel.Debug : LogLevel.Info),
  );
};

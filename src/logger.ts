import { addBreadcrumb, SeverityLevel } from '@sentry/node';
import consola, {
  BasicReporter,
  Consola,
  ConsolaReporterLogObject,
  LogLevel,
} from 'consola';

/** Reporter that writes all output to stderr (so release notes on stdout aren't polluted) */
class StderrReporter extends BasicReporter {
  public log(logObj: ConsolaReporterLogObject): void {
    const output = this.formatLogObj(logObj);
    process.stderr.write(output + '\n');
  }
}

consola.setReporters([new StderrReporter()]);

const BREADCRUMB_LEVELS: Record<string, SeverityLevel> = {
  fatal: 'fatal',
  error: 'error',
  warn: 'warning',
  log: 'log',
  info: 'info',
  start: 'info',
  success: 'info',
  ready: 'info',
  debug: 'debug',
  trace: 'debug',
};

/** Reporter that sends logs to Sentry */
class SentryBreadcrumbReporter extends BasicReporter {
  public log(logObj: ConsolaReporterLogObject): void {
    addBreadcrumb({
      message: this.formatLogObj(logObj),
      level: BREADCRUMB_LEVELS[logObj.type] ?? 'log',
    });
  }
}

export { LogLevel as LogLevel };
const loggers: Consola[] = [];
function createLogger(tag?: string): Consola {
  const loggerInstance = consola.withDefaults({ tag });
  loggerInstance.addReporter(new SentryBreadcrumbReporter());
  loggers.push(loggerInstance);
  return loggerInstance;
}

export const logger = createLogger();
// Pause until we set the logging level from helpers#setGlobals
// This allows us to enqueue debug logging even before we set the
// logging level. These are flushed as soon as we run `logger.resume()`.
logger.pause();

export function setLevel(logLevel: LogLevel): void {
  consola.level = logLevel;
  for (const loggerInstance of loggers) {
    loggerInstance.level = logLevel;
    loggerInstance.resume();
  }
}

import { ConsoleLogger, LogLevel } from '@nestjs/common';

/**
 * ConsoleLogger that writes every level to stderr, leaving stdout to the report
 */
export class StderrLogger extends ConsoleLogger {
  protected printMessages(messages: unknown[], context = '', logLevel: LogLevel = 'log'): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}

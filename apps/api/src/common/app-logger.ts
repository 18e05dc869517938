// apps/api/src/common/app-logger.ts
import { Logger } from '@nestjs/common';
import { formatLogTag } from './log-context';

/** Nest logger that tags string messages with the current request's log context. */
export class AppLogger extends Logger {
  private tag(message: unknown): unknown {
    if (typeof message !== 'string' || message.startsWith('[reqId=')) {
      return message;
    }
    const tag = formatLogTag();
    return tag ? `${tag} ${message}` : message;
  }

  log(message: unknown, ...optionalParams: unknown[]): void {
    super.log(this.tag(message), ...optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    super.error(this.tag(message), ...optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    super.warn(this.tag(message), ...optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    super.debug(this.tag(message), ...optionalParams);
  }
}

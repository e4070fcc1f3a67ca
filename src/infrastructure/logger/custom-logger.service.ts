import { ConsoleLogger, Injectable } from '@nestjs/common';
import type { ILogger, LogContext } from '@/domain/services';

interface ComposedLine {
  text: string;
  context?: string;
  stack?: string;
}

function isLogContext(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * ConsoleLogger that accepts a structured context object after the message:
 *
 *   logger.log('Applicant inserted', { autoNumber: 42 })
 *   → [Nest] ... LOG [ApplicantService] Applicant inserted {"autoNumber":42}
 *
 * Plain Nest calls (message, context) and (message, stack, context) pass through unchanged.
 */
@Injectable()
export class LoggerService extends ConsoleLogger implements ILogger {
  constructor(context: string = '') {
    super(context);
  }

  log(message: string, ...optionalParams: unknown[]) {
    const line = this.compose(message, optionalParams);
    if (line.context) {
      super.log(line.text, line.context);
    } else {
      super.log(line.text);
    }
  }

  error(message: string, ...optionalParams: unknown[]) {
    const line = this.compose(message, optionalParams);
    if (line.stack) {
      super.error(line.text, line.stack, line.context);
    } else if (line.context) {
      super.error(line.text, line.context);
    } else {
      super.error(line.text);
    }
  }

  warn(message: string, ...optionalParams: unknown[]) {
    const line = this.compose(message, optionalParams);
    if (line.context) {
      super.warn(line.text, line.context);
    } else {
      super.warn(line.text);
    }
  }

  debug(message: string, ...optionalParams: unknown[]) {
    const line = this.compose(message, optionalParams);
    if (line.context) {
      super.debug(line.text, line.context);
    } else {
      super.debug(line.text);
    }
  }

  verbose(message: string, ...optionalParams: unknown[]) {
    const line = this.compose(message, optionalParams);
    if (line.context) {
      super.verbose(line.text, line.context);
    } else {
      super.verbose(line.text);
    }
  }

  private compose(message: string, optionalParams: unknown[]): ComposedLine {
    const [first, ...rest] = optionalParams;
    const asString = (value: unknown) => (typeof value === 'string' ? value : undefined);

    if (!isLogContext(first)) {
      // Nest internals: (context) or (stack, context)
      if (rest.length > 0) {
        return { text: message, stack: asString(first), context: asString(rest[0]) };
      }
      return { text: message, context: asString(first) };
    }

    const { stack, ...fields } = first;
    const defined = Object.entries(fields).filter(([, value]) => value !== undefined);
    const text = defined.length > 0 ? `${message} ${JSON.stringify(Object.fromEntries(defined))}` : message;

    return { text, stack: asString(stack), context: asString(rest[0]) };
  }
}

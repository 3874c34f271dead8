import type { ChalkInstance } from 'chalk';
import { match } from 'ts-pattern';
import { ErrorType, type ErrorContext } from '../types/error-handler.js';
import { createPalette } from './output.js';

export class HookError extends Error {
  public readonly type: ErrorType;
  public readonly context: ErrorContext;
  public readonly userMessage: string;

  constructor(
    message: string,
    type: ErrorType = ErrorType.UNKNOWN_ERROR,
    context: ErrorContext = {},
    userMessage?: string
  ) {
    super(message);
    this.name = 'HookError';
    this.type = type;
    this.context = { ...context, timestamp: new Date() };
    this.userMessage = userMessage ?? this.getDefaultUserMessage();
  }

  private getDefaultUserMessage(): string {
    return match(this.type)
      .with(
        ErrorType.VALIDATION_ERROR,
        () => 'Invalid input provided. Please check your arguments and try again.'
      )
      .with(
        ErrorType.FILE_SYSTEM_ERROR,
        () => 'Could not read the commit message file. Please check the path and its permissions.'
      )
      .with(
        ErrorType.ENCODING_ERROR,
        () => 'The commit message file is not valid UTF-8.'
      )
      .with(
        ErrorType.CONFIG_ERROR,
        () => 'Configuration error. Please check your configuration file.'
      )
      .otherwise(() => 'An unexpected error occurred. Please try again.');
  }
}

const errorCodeOf = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};

export class ErrorHandler {
  private readonly palette: ChalkInstance;

  constructor(useColor: boolean = true) {
    this.palette = createPalette(useColor);
  }

  public handleError = (error: unknown, context: ErrorContext = {}): HookError => {
    const hookError = error instanceof HookError ? error : this.createHookError(error, context);
    this.displayError(hookError);
    return hookError;
  };

  private readonly createHookError = (error: unknown, context: ErrorContext): HookError => {
    const message = error instanceof Error ? error.message : String(error);

    const errorType = match(errorCodeOf(error))
      .with('ENOENT', 'EACCES', 'EPERM', 'ENOTDIR', 'EISDIR', () => ErrorType.FILE_SYSTEM_ERROR)
      .otherwise(() => ErrorType.UNKNOWN_ERROR);

    return new HookError(message, errorType, context);
  };

  private readonly displayError = (error: HookError): void => {
    const color = this.getErrorColor(error.type);
    console.error(color(`✖ ${error.userMessage}`));

    if (error.context.operation) {
      console.error(this.palette.gray(`   Operation: ${error.context.operation}`));
    }

    if (error.context.file) {
      console.error(this.palette.gray(`   File: ${error.context.file}`));
    }

    if (error.message !== error.userMessage) {
      console.error(this.palette.gray(`   Reason: ${error.message}`));
    }
  };

  private readonly getErrorColor = (type: ErrorType): ChalkInstance =>
    match(type)
      .with(ErrorType.VALIDATION_ERROR, ErrorType.CONFIG_ERROR, () => this.palette.yellow)
      .with(ErrorType.FILE_SYSTEM_ERROR, () => this.palette.cyan)
      .otherwise(() => this.palette.red);
}

/**
 * Runs `operation`, routing any failure through `handler` so it is displayed
 * once, and hands the resulting `HookError` back instead of rethrowing.
 */
export const withErrorHandling = <T>(
  operation: () => T,
  handler: ErrorHandler,
  context: ErrorContext = {}
): T | HookError => {
  try {
    return operation();
  } catch (error) {
    return handler.handleError(error, context);
  }
};

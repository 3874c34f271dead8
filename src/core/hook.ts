import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { Command, CommanderError } from 'commander';
import { ConfigManager } from '../config.js';
import { RESULT, UI_CONSTANTS } from '../constants/ui.js';
import { HELP_MESSAGES } from '../constants/messages.js';
import {
  HookArgumentsSchema,
  HookOptionsSchema,
  PackageJsonSchema,
  formatIssues,
  type ResolvedHookConfig,
  type ValidatedHookOptions,
} from '../schemas/validation.js';
import { MatchMode, type HookConfig } from '../types/common.js';
import { ErrorType } from '../types/error-handler.js';
import { ErrorHandler, HookError, withErrorHandling } from '../utils/error-handler.js';
import { fail, failVerbose, unicodeDecodeError, verboseArg } from '../utils/output.js';
import { cleanCommitMessage } from './commit-message.js';
import { resolveEmojiSet } from './emoji-set.js';
import { validate } from './format.js';

export const RESULT_SUCCESS = RESULT.SUCCESS;
export const RESULT_FAIL = RESULT.FAIL;

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8'))
);

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Reads a commit message file as strict UTF-8.
 * @throws HookError of type ENCODING_ERROR when the bytes are not valid UTF-8;
 *   fs errors propagate unchanged.
 */
export const readCommitMessage = (inputFile: string): string => {
  const bytes = readFileSync(inputFile);
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new HookError(
      error instanceof Error ? error.message : 'Invalid UTF-8 sequence',
      ErrorType.ENCODING_ERROR,
      { operation: 'readCommitMessage', file: inputFile }
    );
  }
};

// Flags can only tighten the config file: turn strict/verbose on, color off
export const resolveHookConfig = (
  options: ValidatedHookOptions,
  config: HookConfig
): ResolvedHookConfig => ({
  emojis: [...config.emojis],
  strict: options.strict || (config.strict ?? false),
  verbose: options.verbose || (config.verbose ?? false),
  color: options.color && (config.color ?? true),
});

export const checkCommitMessage = (args: unknown, rawOptions: unknown): number => {
  const parsedOptions = HookOptionsSchema.safeParse(rawOptions);
  const parsedArgs = HookArgumentsSchema.safeParse(args);
  const handler = new ErrorHandler(parsedOptions.success ? parsedOptions.data.color : true);

  if (!parsedOptions.success || !parsedArgs.success) {
    const issues: string[] = parsedOptions.success ? [] : [formatIssues(parsedOptions.error)];
    if (!parsedArgs.success) issues.push(formatIssues(parsedArgs.error));
    handler.handleError(
      new HookError(issues.join(', '), ErrorType.VALIDATION_ERROR, { operation: 'parseArguments' })
    );
    return RESULT_FAIL;
  }

  const options = parsedOptions.data;
  const { emojis, inputFile } = parsedArgs.data;

  const configManager = withErrorHandling(() => new ConfigManager(options.config), handler, {
    operation: 'loadConfig',
  });
  if (configManager instanceof HookError) return RESULT_FAIL;

  const config = resolveHookConfig(options, configManager.getConfig());

  let message: string;
  try {
    message = readCommitMessage(inputFile);
  } catch (error) {
    if (error instanceof HookError && error.type === ErrorType.ENCODING_ERROR) {
      console.log(unicodeDecodeError(config.color));
    } else {
      handler.handleError(error, { operation: 'readCommitMessage', file: inputFile });
    }
    return RESULT_FAIL;
  }

  const emojiSet = resolveEmojiSet([...config.emojis, ...emojis]);
  const mode = config.strict ? MatchMode.STRICT : MatchMode.LENIENT;
  const verdict = validate(message, emojiSet, mode);

  if (verdict.matched) return RESULT_SUCCESS;

  console.log(fail(cleanCommitMessage(message).trim(), config.color));
  console.log(
    config.verbose
      ? failVerbose(verdict.reason, emojiSet, inputFile, config.color)
      : verboseArg(config.color)
  );

  return RESULT_FAIL;
};

export const createProgram = (onRun: (args: string[], options: unknown) => void): Command =>
  new Command()
    .name(UI_CONSTANTS.CLI_NAME)
    .description(HELP_MESSAGES.DESCRIPTION)
    .version(packageJson.version)
    .argument('<args...>', HELP_MESSAGES.EMOJI_ARGS)
    .option('--strict', HELP_MESSAGES.STRICT)
    .option('--verbose', HELP_MESSAGES.VERBOSE)
    .option('--no-color', HELP_MESSAGES.NO_COLOR)
    .option('--config <path>', HELP_MESSAGES.CONFIG)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => console.log(str.trimEnd()),
      writeErr: (str) => console.error(str.trimEnd()),
    })
    .action(onRun);

export const main = (argv: readonly string[] = process.argv.slice(2)): number => {
  let result: number = RESULT_FAIL;
  const program = createProgram((args, options) => {
    result = checkCommitMessage(args, options);
  });

  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? RESULT_SUCCESS : RESULT_FAIL;
    }
    throw error;
  }

  return result;
};

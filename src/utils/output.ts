import { EOL } from 'os';
import { Chalk, type ChalkInstance } from 'chalk';
import { match } from 'ts-pattern';
import { UI_CONSTANTS } from '../constants/ui.js';
import {
  ENCODING_MESSAGES,
  FAIL_MESSAGES,
  GUIDANCE_MESSAGES,
  HELP_MESSAGES,
} from '../constants/messages.js';
import { FailureReason, type EmojiSet } from '../types/common.js';

// Level is fixed instead of detected from the terminal
export const createPalette = (useColor: boolean): ChalkInstance => new Chalk({ level: useColor ? 1 : 0 });

const indent = (text: string): string => `${UI_CONSTANTS.INDENT}${text}`;

export const fail = (message: string, useColor: boolean = true): string => {
  const c = createPalette(useColor);
  return [
    `${c.red.bold(FAIL_MESSAGES.BAD_COMMIT)} ${message}`,
    c.yellow(FAIL_MESSAGES.NOT_FOLLOWING_FORMAT),
    c.blue(UI_CONSTANTS.GITMOJI_URL),
  ].join(EOL);
};

export const verboseArg = (useColor: boolean = true): string => {
  const c = createPalette(useColor);
  return [
    '',
    `${c.yellow(HELP_MESSAGES.USE_VERBOSE_PREFIX)} --verbose ${c.yellow(HELP_MESSAGES.USE_VERBOSE_SUFFIX)}`,
  ].join(EOL);
};

export const formatEmojiSample = (emojiSet: EmojiSet): string =>
  emojiSet.slice(0, UI_CONSTANTS.EMOJI_SAMPLE_SIZE).join(' ');

export const guidanceFor = (reason: FailureReason, emojiSet: EmojiSet, c: ChalkInstance): string =>
  match(reason)
    .with(
      FailureReason.NO_EMOJI_PREFIX,
      () => `  - ${c.yellow(GUIDANCE_MESSAGES.NO_EMOJI_PREFIX)} ${c.blue(formatEmojiSample(emojiSet))}...`
    )
    .with(FailureReason.EMPTY_DESCRIPTION, () => `  - ${c.yellow(GUIDANCE_MESSAGES.EMPTY_DESCRIPTION)}`)
    .exhaustive();

export const failVerbose = (
  reason: FailureReason,
  emojiSet: EmojiSet,
  inputFile: string,
  useColor: boolean = true
): string => {
  const c = createPalette(useColor);
  return [
    '',
    c.yellow(FAIL_MESSAGES.PATTERN_INTRO),
    '',
    indent(FAIL_MESSAGES.PATTERN),
    '',
    indent(FAIL_MESSAGES.PATTERN_BODY),
    '',
    c.yellow(FAIL_MESSAGES.EXAMPLES),
    ...UI_CONSTANTS.EXAMPLE_MESSAGES.map(indent),
    '',
    c.yellow(FAIL_MESSAGES.CORRECT_ERRORS),
    '',
    guidanceFor(reason, emojiSet, c),
    '',
    c.yellow(FAIL_MESSAGES.RUN),
    '',
    indent(`git commit --edit --file=${inputFile}`),
    '',
    c.yellow(FAIL_MESSAGES.EDIT_AND_RETRY),
    '',
    `${c.yellow(FAIL_MESSAGES.FULL_LIST)} ${c.blue(UI_CONSTANTS.GITMOJI_URL)}`,
  ].join(EOL);
};

export const unicodeDecodeError = (useColor: boolean = true): string => {
  const c = createPalette(useColor);
  return [
    '',
    c.red(ENCODING_MESSAGES.TITLE),
    '',
    c.yellow(ENCODING_MESSAGES.NOT_DECODED),
    c.yellow(ENCODING_MESSAGES.UTF8_ASSUMED),
    `${c.yellow(ENCODING_MESSAGES.SEE)} ${c.blue(ENCODING_MESSAGES.DOCS_URL)} ${c.yellow(ENCODING_MESSAGES.FOR_MORE)}`,
  ].join(EOL);
};

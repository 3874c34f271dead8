import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { HookConfigSchema, formatIssues } from './schemas/validation.js';
import type { HookConfig } from './types/common.js';
import { ErrorType } from './types/error-handler.js';
import { HookError } from './utils/error-handler.js';
import { CONFIG_FILE, DEFAULT_CONFIG } from './constants/config.js';
import { WARNING_MESSAGES } from './constants/messages.js';

export class ConfigManager {
  private readonly configPath: string;
  private readonly config: HookConfig;

  /**
   * @param configPath - explicit config file; when omitted, `.gitmojirc.json`
   *   in `cwd` is used if it exists.
   */
  constructor(configPath?: string, cwd: string = process.cwd()) {
    if (configPath !== undefined && !fs.existsSync(path.resolve(cwd, configPath))) {
      throw new HookError(
        `Config file not found: ${configPath}`,
        ErrorType.CONFIG_ERROR,
        { operation: 'loadConfig', file: configPath }
      );
    }

    this.configPath = path.resolve(cwd, configPath ?? CONFIG_FILE);
    this.config = this.loadConfig();
  }

  private readonly loadConfig = (): HookConfig => {
    if (!fs.existsSync(this.configPath)) {
      return { ...DEFAULT_CONFIG };
    }

    try {
      const userConfig: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));

      const result = HookConfigSchema.safeParse(userConfig);
      if (result.success) {
        return { ...DEFAULT_CONFIG, ...result.data };
      }

      console.warn(chalk.yellow(`${WARNING_MESSAGES.INVALID_CONFIG} ${formatIssues(result.error)}`));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(chalk.yellow(`${WARNING_MESSAGES.FAILED_TO_LOAD_CONFIG} ${reason}`));
    }

    return { ...DEFAULT_CONFIG };
  };

  public getConfig = (): HookConfig => ({ ...this.config, emojis: [...this.config.emojis] });
}

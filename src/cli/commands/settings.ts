/**
 * Settings command - List recognized options
 */

import chalk from "chalk";
import { runRegistry } from "../../modules";
import { getReader } from "../../readers";
import { describeOptionType, formatSettingValue } from "../../settings/option-types";
import type { SettingsRegistry } from "../../settings/registry";
import { logger } from "../../utils";
import { getWriter } from "../../writers";

export function settingsCommand(opts: { writer: string }): void {
  let registry: SettingsRegistry;
  try {
    registry = runRegistry(getReader("text"), getWriter(opts.writer));
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
    return;
  }

  for (const option of registry.list()) {
    console.log(
      `  ${chalk.bold(option.name.padEnd(18))} ${chalk.cyan(describeOptionType(option.type))} ${chalk.dim(`(default: ${formatSettingValue(option.default)})`)}`,
    );
    console.log(`  ${" ".repeat(18)} ${option.description}`);
  }
}

import chalk from 'chalk';
import { defaultConfigManager, type ConfigManager, type StoredConfig } from '../../config/index.js';

export async function configCommand(
  options: {
    show?: boolean;
    socket?: string;
    appClass?: string;
    timeout?: number;
    validateSocket?: boolean;
  },
  manager: ConfigManager = defaultConfigManager,
) {
  if (options.show) {
    const resolved = manager.resolve();
    const stored = manager.loadStoredConfig();
    console.log(chalk.cyan('\n📋 Current configuration:\n'));
    console.log(chalk.gray(`   Config file: ${manager.getConfigPath()}`));
    console.log(chalk.gray(`   Socket: ${resolved.socketPath}${stored.socketPath ? '' : ' (default)'}`));
    console.log(chalk.gray(`   App class: ${resolved.target ?? '(default)'}`));
    console.log(chalk.gray(`   Request timeout: ${resolved.requestTimeoutMs}ms`));
    console.log(chalk.gray(`   Validate socket: ${resolved.validateSocket ? 'on' : 'off'}`));
    console.log('');
    return;
  }

  const updates: Partial<StoredConfig> = {};

  if (options.socket !== undefined) {
    updates.socketPath = options.socket;
    console.log(chalk.green(`✅ Socket path saved: ${options.socket}`));
  }

  if (options.appClass !== undefined) {
    updates.appClass = options.appClass;
    console.log(chalk.green(`✅ App class saved: ${options.appClass}`));
  }

  if (options.timeout !== undefined) {
    if (!Number.isFinite(options.timeout) || options.timeout <= 0) {
      console.error(chalk.red('Invalid timeout. Use a positive number of milliseconds.'));
      process.exitCode = 1;
      return;
    }
    updates.requestTimeoutMs = Math.floor(options.timeout);
    console.log(chalk.green(`✅ Request timeout saved: ${updates.requestTimeoutMs}ms`));
  }

  if (options.validateSocket !== undefined) {
    updates.validateSocket = options.validateSocket;
    console.log(chalk.green(`✅ Socket validation: ${options.validateSocket ? 'on' : 'off'}`));
  }

  if (Object.keys(updates).length === 0) {
    console.log(chalk.yellow('No options provided. Use --help to see available options.'));
    console.log(chalk.gray('\nExample:'));
    console.log(chalk.gray('  ghostty-driver config --socket ~/ghostty.sock'));
    console.log(chalk.gray('  ghostty-driver config --show'));
    return;
  }

  manager.saveConfig(updates);
  console.log(chalk.gray(`   Saved to ${manager.getConfigPath()}`));
}

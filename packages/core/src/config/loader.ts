import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, formatIssues, type Config, type ConfigInput } from '@benchkit/shared';

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: ConfigInput; // CLI flags
  cwd?: string; // Directory holding .benchkit.yaml
  homeDir?: string; // Directory holding .benchkit/config.yaml
}

type ConfigRecord = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const USER_CONFIG_PATH = path.join('.benchkit', 'config.yaml');
export const REPO_CONFIG_FILE = '.benchkit.yaml';

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, { cause: error });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) return {};
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      // Arrays and primitives replace
      output[key] =
        isPlainObject(sourceValue) && isPlainObject(targetValue)
          ? this.mergeConfigs(targetValue, sourceValue)
          : sourceValue;
    }
    return output;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd ?? process.cwd();
    const homeDir = options.homeDir ?? os.homedir();

    // 1. User config: ~/.benchkit/config.yaml
    const userConfig = this.loadYaml(path.join(homeDir, USER_CONFIG_PATH));

    // 2. Project config: <cwd>/.benchkit.yaml
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILE));

    // 3. Explicit --config file
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // flags > explicit > repo > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, options.flags ?? {});

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error)}`, {
        details: { issues: result.error.issues.map((i) => i.path.join('.')) },
      });
    }
    return result.data;
  }
}

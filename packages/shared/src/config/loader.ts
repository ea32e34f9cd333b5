import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError } from '../errors';
import { ConfigSchema, type Config, type ConfigInput } from './schema';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: ConfigInput; // CLI flags
  cwd?: string; // Repository root (for repo config)
  homeDir?: string;
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      const parsed: unknown = yaml.load(content);
      if (parsed === undefined || parsed === null) {
        return {};
      }
      if (!isRecord(parsed)) {
        throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
      }
      return parsed;
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };

    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      if (sourceValue === undefined) {
        continue;
      }

      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const homeDir = options.homeDir || os.homedir();

    // 1. User config: ~/.histree/config.yaml
    const userConfig = this.loadYaml(path.join(homeDir, '.histree', 'config.yaml'));

    // 2. Repo config: <repoRoot>/.histree.yaml
    const repoConfig = this.loadYaml(path.join(cwd, '.histree.yaml'));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. CLI flags (passed as partial config)
    const flagConfig: ConfigRecord = { ...(options.flags ?? {}) };

    // Precedence: flags > explicit > repo > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}

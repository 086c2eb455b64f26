import * as fs from 'fs';
import * as dotenv from 'dotenv';
import * as YAML from 'yaml';
import { AppConfigSchema } from './ConfigSchema';
import { AppConfig } from '../../domain/config/AppConfig';
import { ConfigurationError, errorMessage } from '../../domain/errors/AppErrors';

// Load env vars
dotenv.config();

/**
 * Values supplied on the command line; they take precedence over everything else.
 */
export interface ConfigOverrides {
  configPath?: string;
  delayBetweenRequests?: number;
  maxRequestsPerMinute?: number;
  timeout?: number;
  outputDir?: string;
  idmPath?: string;
  downloadDir?: string;
  logLevel?: string;
  logFile?: string;
}

type Layer = Record<string, unknown>;

const NESTED_SECTIONS = ['retry', 'extraction'];

function isPlainObject(value: unknown): value is Layer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.trim().toLowerCase() !== 'false';
}

/**
 * Drops undefined entries so they never shadow a lower layer.
 */
function defined(layer: Layer): Layer {
  return Object.fromEntries(Object.entries(layer).filter(([, value]) => value !== undefined));
}

/**
 * Merges layers left to right; the retry and extraction sections merge key by key.
 */
export function mergeLayers(...layers: Layer[]): Layer {
  const merged: Layer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(defined(layer))) {
      const current = merged[key];
      if (NESTED_SECTIONS.includes(key) && isPlainObject(current) && isPlainObject(value)) {
        merged[key] = { ...current, ...defined(value) };
      } else {
        merged[key] = value;
      }
    }
  }
  return merged;
}

export class ConfigFactory {
  /**
   * Builds the run configuration from defaults, an optional YAML file,
   * environment variables and command-line overrides, in that order.
   * @throws ConfigurationError when a layer is unreadable or the result is invalid
   */
  static load(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): AppConfig {
    const fileLayer = overrides.configPath ? ConfigFactory.readFile(overrides.configPath) : {};

    const envLayer: Layer = {
      delayBetweenRequests: parseNumber(env.DELAY_BETWEEN_REQUESTS),
      maxRequestsPerMinute: parseNumber(env.MAX_REQUESTS_PER_MINUTE),
      timeout: parseNumber(env.PAGE_TIMEOUT),
      headless: parseBoolean(env.HEADLESS),
      logLevel: env.LOG_LEVEL,
      logFile: env.LOG_FILE,
      outputDir: env.OUTPUT_DIR,
      idmPath: env.IDM_PATH,
      downloadDir: env.DOWNLOAD_DIR,
    };

    const cliLayer: Layer = {
      delayBetweenRequests: overrides.delayBetweenRequests,
      maxRequestsPerMinute: overrides.maxRequestsPerMinute,
      timeout: overrides.timeout,
      outputDir: overrides.outputDir,
      idmPath: overrides.idmPath,
      downloadDir: overrides.downloadDir,
      logLevel: overrides.logLevel,
      logFile: overrides.logFile,
    };

    return ConfigFactory.parse(mergeLayers(fileLayer, envLayer, cliLayer));
  }

  /**
   * Validates a raw configuration object.
   */
  static parse(raw: unknown): AppConfig {
    const result = AppConfigSchema.safeParse(raw);

    if (!result.success) {
      const details = result.error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid configuration: ${details}`);
    }

    return result.data;
  }

  /**
   * Reads a YAML configuration file into a raw layer.
   */
  static readFile(configPath: string): Layer {
    if (!fs.existsSync(configPath)) {
      throw new ConfigurationError(`Configuration file not found: ${configPath}`);
    }

    let data: unknown;
    try {
      data = YAML.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Cannot parse ${configPath}: ${errorMessage(error)}`);
    }

    if (data === null || data === undefined) {
      return {};
    }
    if (!isPlainObject(data)) {
      throw new ConfigurationError(`${configPath} must contain a mapping of settings`);
    }
    return data;
  }

  /**
   * Writes a configuration file holding every default value.
   */
  static writeDefault(outputPath: string): void {
    const defaults = AppConfigSchema.parse({});
    fs.writeFileSync(outputPath, YAML.stringify(defaults), 'utf-8');
  }
}
